import { SlidingWindowLoggingRateLimiter } from "../sliding-window-logging";

describe("SlidingWindowLoggingRateLimiter (system clock)", () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it("초과 호출은 거절되지 않고 윈도우가 비워질 때까지 대기해야 한다", async () => {
    const rateLimiter = new SlidingWindowLoggingRateLimiter({
      capacity: 3,
      windowSizeMs: 10_000,
    });

    for (let i = 0; i < 3; i++) {
      await rateLimiter.acquire();
    }

    jest.advanceTimersByTime(100);

    let admitted = false;
    const pending = rateLimiter.acquire().then(() => {
      admitted = true;
    });

    // 9999ms 시점: 아직 첫 호출이 윈도우 안에 있음
    await jest.advanceTimersByTimeAsync(9_899);
    expect(admitted).toBe(false);

    // 10000ms 시점: 첫 호출 만료
    await jest.advanceTimersByTimeAsync(1);
    await pending;
    expect(admitted).toBe(true);
  });

  it("대기 중인 호출 뒤에 들어온 호출도 순서를 지켜야 한다", async () => {
    const rateLimiter = new SlidingWindowLoggingRateLimiter({
      capacity: 1,
      windowSizeMs: 1_000,
    });
    const order: string[] = [];

    await rateLimiter.acquire();
    const first = rateLimiter.acquire().then(() => order.push("first"));
    const second = rateLimiter.acquire().then(() => order.push("second"));

    await jest.advanceTimersByTimeAsync(1_000);
    expect(order).toEqual(["first"]);

    await jest.advanceTimersByTimeAsync(1_000);
    await Promise.all([first, second]);
    expect(order).toEqual(["first", "second"]);
  });
});
