/**
 * Namespaced console logging gated on the build mode.
 * Everything except `error` is silent unless __DEV__ is true.
 */

declare const __DEV__: boolean

export const DEBUG = {
  enabled: typeof __DEV__ !== 'undefined' ? __DEV__ : false,
}

type LogFn = (...args: unknown[]) => void

export interface Logger {
  log: LogFn
  info: LogFn
  warn: LogFn
  error: LogFn
  /**
   * Start a timer; the returned function logs `label` with the elapsed
   * milliseconds and returns them. Timing is measured in every build.
   */
  time: (label: string) => () => number
}

/**
 * @example
 * const log = createLogger('PageReducer')
 * const done = log.time('Run')
 * done() // [PageReducer] Run: 412ms (dev only)
 */
export function createLogger(namespace: string, now: () => number = () => performance.now()): Logger {
  const prefix = `[${namespace}]`
  const gated = (write: LogFn): LogFn => (...args) => {
    if (DEBUG.enabled) write(prefix, ...args)
  }

  const log = gated(console.log)

  return {
    log,
    info: gated(console.info),
    warn: gated(console.warn),
    error: (...args) => console.error(prefix, ...args),
    time: (label) => {
      const startedAt = now()
      return () => {
        const elapsed = Math.round(now() - startedAt)
        log(`${label}: ${elapsed}ms`)
        return elapsed
      }
    },
  }
}
