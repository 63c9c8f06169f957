export type Logger = {
  warn: (message: string, ...details: unknown[]) => void
  error: (message: string, ...details: unknown[]) => void
}

const LOG_PREFIX = '[async-reset-events]'

const console_logger: Logger = {
  warn: (message, ...details) => console.warn(`${LOG_PREFIX} ${message}`, ...details),
  error: (message, ...details) => console.error(`${LOG_PREFIX} ${message}`, ...details),
}

let active_logger: Logger = console_logger

// Sink failures never reach the caller: log calls run inside pump loops and timers.
// The failure is reported on the console together with the line that was being logged.
const writeTo = (level: keyof Logger, message: string, details: unknown[]): void => {
  try {
    active_logger[level](message, ...details)
  } catch (sink_error) {
    if (active_logger === console_logger) {
      return // the console itself failed; nowhere left to report it
    }
    console_logger.error(`logger.${level} threw ${formatError(sink_error)} while logging: ${message}`, sink_error)
  }
}

export const logger: Logger = {
  warn: (message, ...details) => writeTo('warn', message, details),
  error: (message, ...details) => writeTo('error', message, details),
}

// Swap the sink used by every primitive; pass null to go back to the console.
export const setLogger = (next: Logger | null): void => {
  active_logger = next ?? console_logger
}

export const formatError = (error: unknown): string => {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`
  }
  return String(error)
}
