/**
 * Logger interface for observability
 *
 * Framework-agnostic so the bootstrap steps can log through whatever the
 * host application provides. The CLI supplies a chalk-based implementation.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(meta: Record<string, unknown>): Logger;
}
