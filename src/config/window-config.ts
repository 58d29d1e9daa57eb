import { InvalidConfigurationError } from "../errors";

export interface WindowConfig {
  capacity: number; // 윈도우 내 허용되는 최대 호출 수
  windowSizeMs: number; // 윈도우 크기 (밀리초)
}

export function validateWindowConfig(config: WindowConfig): void {
  if (!Number.isInteger(config.capacity) || config.capacity <= 0) {
    throw new InvalidConfigurationError(
      `capacity must be a positive integer, got ${config.capacity}`
    );
  }
  if (!Number.isFinite(config.windowSizeMs) || config.windowSizeMs <= 0) {
    throw new InvalidConfigurationError(
      `windowSizeMs must be a positive number, got ${config.windowSizeMs}`
    );
  }
}
