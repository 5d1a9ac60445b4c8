export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  // Query context
  query?: string;
  sort?: string;
  roots?: number;

  // Path context
  path?: string;
  root?: string;
  series?: string;
  chapter?: string;

  // Result context
  series_count?: number;
  chapters_count?: number;
  duration_ms?: number;

  // Error context
  error?: string;
  error_stack?: string;
}

export interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  tag: string;
  msg: string;
}
