import pino from "pino";

export interface Logger {
  debug(obj: Record<string, unknown>, msg?: string): void;
  debug(msg: string): void;
  info(obj: Record<string, unknown>, msg?: string): void;
  info(msg: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  warn(msg: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  error(msg: string): void;
}

export function createLogger(name?: string, level = "info"): Logger {
  return pino({ name: name ?? "extension-manager", level });
}

// 테스트 등에서 로그 출력을 끄기 위한 용도
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
