const LOG_SCOPE = 'Plugins'

type LogMeta = Record<string, unknown>

export function formatLogLine(message: string, scope = LOG_SCOPE): string {
  return `[${new Date().toISOString()}] [${scope}] ${message}`
}

// Trailing undefined arguments are dropped.
function emit(write: (...args: unknown[]) => void, message: string, ...args: unknown[]): void {
  let end = args.length
  while (end > 0 && args[end - 1] === undefined) end -= 1
  write(formatLogLine(message), ...args.slice(0, end))
}

export function pluginLog(message: string, meta?: LogMeta): void {
  emit(console.log, message, meta)
}

export function pluginWarn(message: string, meta?: LogMeta): void {
  emit(console.warn, message, meta)
}

export function pluginError(message: string, error?: unknown, meta?: LogMeta): void {
  if (meta) {
    emit(console.error, message, meta, error)
    return
  }
  emit(console.error, message, error)
}
