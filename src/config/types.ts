import type { LogLevel } from "../observability/logger.js";

export interface HttpConfig {
  host: string;
  port: number;
  corsOrigin: string;
  maxBodyBytes: number;
}

export interface TypingConfig {
  maxBatchSize: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface Config {
  http: HttpConfig;
  typing: TypingConfig;
  logging: LoggingConfig;
}
