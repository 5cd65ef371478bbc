/** Levels accepted by the `--log` option. */
export type LogLevel =
  | 'silent'
  | 'fatal'
  | 'error'
  | 'trace'
  | 'debug'
  | 'warn'
  | 'info'
