import pino, { type Logger } from 'pino'

/**
 * Application logger
 * Writes JSON lines to stderr so the terminal screen on stdout stays readable
 */
export const logger: Logger = pino(
  {
    name: 'stock-manager',
    level: process.env.LOG_LEVEL ?? 'info'
  },
  pino.destination(2)
)

// Children copy the level when created, so later changes are pushed to them
const componentLoggers = new Set<Logger>()

/**
 * Child logger tagged with the component emitting the entries
 */
export function createLogger(component: string): Logger {
  const child = logger.child({ component })
  componentLoggers.add(child)
  return child
}

export function setLogLevel(level: string): void {
  logger.level = level
  for (const child of componentLoggers) {
    child.level = level
  }
}
