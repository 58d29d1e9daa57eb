export class AppError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly code: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, "Invalid Configuration");
  }
}

export class RemoteApiError extends AppError {
  constructor(
    readonly url: string,
    readonly status: number,
    statusText: string
  ) {
    super(`Failed to fetch ${url}: ${status} ${statusText}`, 502, "Bad Gateway");
  }
}

export class UnexpectedResponseError extends AppError {
  constructor(url: string, detail: string) {
    super(`Unexpected response from ${url}: ${detail}`, 502, "Bad Gateway");
  }
}

export class CliToolError extends AppError {
  constructor(message: string) {
    super(message, 502, "Bad Gateway");
  }
}

export class TokenDecryptionError extends AppError {
  constructor() {
    super("Failed to decrypt token: wrong password or corrupted data", 400, "Bad Request");
  }
}

export class RequestValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, "Bad Request");
  }
}

export class NotConfiguredError extends AppError {
  constructor(setting: string) {
    super(`${setting} is not configured`, 409, "Conflict");
  }
}

// Node 코어 에러는 다른 realm 에서 올 수 있으므로 instanceof 대신 형태로 확인한다
export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

export function errorMessage(error: unknown): string {
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}
