import chalk from "chalk"

export type LogLevel = "debug" | "info" | "warn" | "error"

export type LogEntry = {
    timestamp: number
    level: LogLevel
    message: string
}

export type LogSink = (level: LogLevel, line: string) => void

export type LoggerOptions = {
    level?: LogLevel
    sink?: LogSink | null // null disables output, entries are still buffered
    maxEntries?: number
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
}

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
    debug: chalk.gray,
    info: chalk.cyan,
    warn: chalk.yellow,
    error: chalk.red,
}

const consoleSink: LogSink = (level, line) => {
    if (level === "warn" || level === "error") {
        console.error(line)
    } else {
        console.log(line)
    }
}

/**
 * Leveled logger that writes coloured lines and keeps a ring buffer of the
 * most recent entries, so commands and tests can inspect what was reported.
 */
export class Logger {
    level: LogLevel
    private readonly sink: LogSink | null
    private readonly maxEntries: number
    private entries: LogEntry[] = []

    constructor(options: LoggerOptions = {}) {
        this.level = options.level ?? "info"
        this.sink = options.sink === undefined ? consoleSink : options.sink
        this.maxEntries = options.maxEntries ?? 1000
    }

    debug(message: string) {
        this.log("debug", message)
    }

    info(message: string) {
        this.log("info", message)
    }

    warn(message: string) {
        this.log("warn", message)
    }

    error(message: string) {
        this.log("error", message)
    }

    log(level: LogLevel, message: string) {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return

        this.entries.push({timestamp: Date.now(), level, message})
        if (this.entries.length > this.maxEntries) {
            this.entries.shift()
        }

        if (this.sink) {
            this.sink(level, LEVEL_STYLE[level](message))
        }
    }

    getEntries(level?: LogLevel): LogEntry[] {
        return level ? this.entries.filter(e => e.level === level) : [...this.entries]
    }

    clear() {
        this.entries = []
    }
}

export const logger = new Logger()
