import { z } from "zod";
import { AsyncRateLimiter } from "../rate-limiter";
import { Logger } from "../logger";
import { RemoteApiError, UnexpectedResponseError } from "../errors";

// 토큰은 이 호스트로만 보낸다
const TOKEN_HOSTS = new Set(["api.github.com", "raw.githubusercontent.com"]);

function isTokenHost(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === "https:" && TOKEN_HOSTS.has(parsed.hostname);
  } catch {
    return false;
  }
}

export interface GitHubClientOptions {
  limiter: AsyncRateLimiter;
  logger: Logger;
  token?: string;
  userAgent?: string;
  fetchImpl?: typeof fetch;
}

export class GitHubClient {
  private token?: string;
  private readonly limiter: AsyncRateLimiter;
  private readonly logger: Logger;
  private readonly userAgent: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: GitHubClientOptions) {
    this.limiter = options.limiter;
    this.logger = options.logger;
    this.token = options.token;
    this.userAgent = options.userAgent ?? "extension-manager-server";
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  setToken(token: string | undefined): void {
    this.token = token;
  }

  hasToken(): boolean {
    return this.token !== undefined;
  }

  /**
   * REST API 호출. 호출마다 rate limiter 를 한 번 통과한다.
   */
  async getJson<T>(url: string, schema: z.ZodType<T>): Promise<T> {
    await this.limiter.acquire();

    const response = await this.get(url, "application/vnd.github+json");
    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new UnexpectedResponseError(url, "invalid JSON");
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      this.logger.warn({ url, issues: parsed.error.issues }, "unexpected response shape");
      throw new UnexpectedResponseError(url, parsed.error.issues[0]?.message ?? "invalid body");
    }
    return parsed.data;
  }

  // raw 파일 다운로드는 API 쿼터에 포함되지 않으므로 limiter 를 거치지 않는다
  async getText(url: string): Promise<string> {
    const response = await this.get(url, "text/plain");
    return response.text();
  }

  private async get(url: string, accept: string): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: accept,
      "User-Agent": this.userAgent,
    };
    if (this.token && isTokenHost(url)) {
      headers.Authorization = `token ${this.token}`;
    }

    this.logger.debug({ url }, "GET");
    const response = await this.fetchImpl(url, { method: "GET", headers });
    if (!response.ok) {
      this.logger.warn({ url, status: response.status }, "request failed");
      throw new RemoteApiError(url, response.status, response.statusText);
    }
    return response;
  }
}
