import { z } from "zod";
import { GitHubClient } from "../github-client";
import { AsyncRateLimiter } from "../../rate-limiter";
import { createSilentLogger } from "../../logger";
import { RemoteApiError, UnexpectedResponseError } from "../../errors";

describe("GitHubClient", () => {
  let limiter: AsyncRateLimiter & { acquire: jest.Mock };
  let fetchImpl: jest.Mock;
  let client: GitHubClient;

  const releaseSchema = z.object({ tag_name: z.string() });

  beforeEach(() => {
    limiter = { acquire: jest.fn().mockResolvedValue(undefined) };
    fetchImpl = jest.fn();
    client = new GitHubClient({
      limiter,
      logger: createSilentLogger(),
      fetchImpl,
    });
  });

  it("getJson 은 요청 전에 limiter 를 통과해야 한다", async () => {
    fetchImpl.mockImplementation(async () => {
      expect(limiter.acquire).toHaveBeenCalledTimes(1);
      return new Response(JSON.stringify({ tag_name: "v2.38.0" }), { status: 200 });
    });

    const release = await client.getJson("https://api.github.com/x", releaseSchema);

    expect(release).toEqual({ tag_name: "v2.38.0" });
    expect(fetchImpl).toHaveBeenCalledWith("https://api.github.com/x", {
      method: "GET",
      headers: {
        Accept: "application/vnd.github+json",
        "User-Agent": "extension-manager-server",
      },
    });
  });

  it("토큰이 있으면 Authorization 헤더를 붙여야 한다", async () => {
    client.setToken("test-token");
    fetchImpl.mockResolvedValue(new Response("{\"tag_name\":\"v1\"}", { status: 200 }));

    await client.getJson("https://api.github.com/x", releaseSchema);

    const init = fetchImpl.mock.calls[0][1];
    expect(init.headers.Authorization).toBe("token test-token");
    expect(client.hasToken()).toBe(true);
  });

  it("2xx 가 아니면 RemoteApiError 를 던져야 한다", async () => {
    fetchImpl.mockResolvedValue(
      new Response("{}", { status: 403, statusText: "Forbidden" })
    );

    const result = client.getJson("https://api.github.com/x", releaseSchema);

    await expect(result).rejects.toThrow(RemoteApiError);
    await expect(result).rejects.toThrow(
      "Failed to fetch https://api.github.com/x: 403 Forbidden"
    );
  });

  it("응답 형식이 다르면 UnexpectedResponseError 를 던져야 한다", async () => {
    fetchImpl.mockResolvedValue(new Response("[]", { status: 200 }));

    await expect(
      client.getJson("https://api.github.com/x", releaseSchema)
    ).rejects.toThrow(UnexpectedResponseError);
  });

  it("2xx 라도 JSON 이 아니면 UnexpectedResponseError 를 던져야 한다", async () => {
    fetchImpl.mockResolvedValue(new Response("<html>rate limited</html>", { status: 200 }));

    await expect(
      client.getJson("https://api.github.com/x", releaseSchema)
    ).rejects.toThrow(
      new UnexpectedResponseError("https://api.github.com/x", "invalid JSON")
    );
  });

  it("토큰은 GitHub 호스트로만 보내야 한다", async () => {
    client.setToken("test-token");
    fetchImpl.mockImplementation(async () => new Response("ok", { status: 200 }));

    await client.getText("https://raw.githubusercontent.com/a/b/main/a.js");
    await client.getText("https://evil.example.test/a.js");
    await client.getText("http://api.github.com/a.js");

    const authorizations = fetchImpl.mock.calls.map(([, init]) => init.headers.Authorization);
    expect(authorizations).toEqual(["token test-token", undefined, undefined]);
  });

  it("getText 는 limiter 를 거치지 않고 본문을 반환해야 한다", async () => {
    fetchImpl.mockResolvedValue(new Response("console.log(1);", { status: 200 }));

    const text = await client.getText("https://raw.example.test/a.js");

    expect(text).toBe("console.log(1);");
    expect(limiter.acquire).not.toHaveBeenCalled();
  });
});
