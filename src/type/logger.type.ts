/**
 * Logger Interface
 *
 * Minimal pluggable logger for build diagnostics such as broken related
 * links. Structurally compatible with `console`, so `setLogger(console)`
 * works without an adapter.
 *
 * Default: no-op. Call setLogger() at startup to wire in.
 */
export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, error?: Error): void;
}

const noop = () => {};

/** Module-level logger. Always callable — defaults to no-op. */
export const logger: Logger = { info: noop, warn: noop, error: noop };

/** Replace the logger implementation. Call once at startup. */
export function setLogger(impl: Logger): void {
  logger.info = impl.info.bind(impl);
  logger.warn = impl.warn.bind(impl);
  logger.error = impl.error.bind(impl);
}
