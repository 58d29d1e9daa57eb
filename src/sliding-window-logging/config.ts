import { WindowConfig } from "../config/window-config";

export type SlidingWindowLoggingConfig = WindowConfig;
