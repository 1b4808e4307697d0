/**
 * Sink for diagnostic messages. Components that log take one as an option and default to
 * `console`; messages carry a bracketed component prefix such as `[Normalization]`.
 */
export type Logger = Pick<Console, 'error' | 'warn' | 'info'>;
