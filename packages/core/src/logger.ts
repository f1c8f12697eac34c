export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;

export const LOG_SCOPE = '[zk-query]';

export function resolveLogger(logger?: Logger): Logger {
  return logger ?? console;
}
