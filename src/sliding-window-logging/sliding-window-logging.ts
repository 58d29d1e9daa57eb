import { AsyncRateLimiter } from "../rate-limiter";
import { Clock, systemClock } from "../clock";
import { validateWindowConfig } from "../config/window-config";
import { Logger } from "../logger";
import { SlidingWindowLoggingConfig } from "./config";

export interface SlidingWindowLoggingOptions {
  clock?: Clock;
  logger?: Logger;
}

/**
 * 허용 시각을 기록해 두고, 최근 windowSizeMs 동안의 호출이 capacity 에 도달하면
 * 가장 오래된 기록이 윈도우를 벗어날 때까지 호출자를 대기시킨다.
 *
 * 동시에 들어온 호출은 호출 순서대로 하나씩 처리된다.
 */
export class SlidingWindowLoggingRateLimiter implements AsyncRateLimiter {
  private timestamps: number[] = [];
  private tail: Promise<void> = Promise.resolve();
  private readonly clock: Clock;
  private readonly logger?: Logger;

  constructor(
    private readonly config: SlidingWindowLoggingConfig,
    options: SlidingWindowLoggingOptions = {}
  ) {
    validateWindowConfig(config);
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
  }

  acquire(): Promise<void> {
    const admission = this.tail.then(() => this.admit());
    // 실패는 해당 호출자에게만 전달하고 다음 호출은 계속 진행한다
    this.tail = admission.catch(() => undefined);
    return admission;
  }

  private async admit(): Promise<void> {
    let now = this.clock.now();
    this.removeExpired(now);

    while (this.timestamps.length >= this.config.capacity) {
      const waitMs = this.waitTime(now);
      this.logger?.debug(
        { waitMs, capacity: this.config.capacity },
        "rate limit window full, waiting"
      );
      await this.clock.sleep(waitMs);
      now = this.clock.now();
      this.removeExpired(now);
    }

    // 기록은 항상 오름차순. 시계가 뒤로 갔으면 직전 기록 시각을 쓴다
    const size = this.timestamps.length;
    this.timestamps.push(size === 0 ? now : Math.max(now, this.timestamps[size - 1]));
  }

  // 정렬되어 있으므로 앞에서부터 만료된 기록만 잘라낸다
  private removeExpired(now: number): void {
    let expired = 0;
    while (
      expired < this.timestamps.length &&
      now - this.timestamps[expired] >= this.config.windowSizeMs
    ) {
      expired++;
    }
    if (expired > 0) {
      this.timestamps.splice(0, expired);
    }
  }

  // 시계가 뒤로 가더라도 0 ~ windowSizeMs 범위를 벗어나지 않는다
  private waitTime(now: number): number {
    const oldest = this.timestamps[0];
    const remaining = this.config.windowSizeMs - (now - oldest);
    return Math.min(Math.max(remaining, 0), this.config.windowSizeMs);
  }
}
