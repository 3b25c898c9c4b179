import { appendFileSync, existsSync, mkdirSync } from "fs"
import { join } from "path"
import { homedir } from "os"

export type LogLevel = "INFO" | "DEBUG" | "WARN" | "ERROR"

export interface LogEntry {
    timestamp: string
    level: LogLevel
    component: string
    message: string
    correlationId?: string
    data?: Record<string, unknown>
}

export type LogFormat = "text" | "json"

export const DEFAULT_LOG_DIR = join(homedir(), ".config", "extension-kit", "logs")

export class Logger {
    private logDir: string
    public enabled: boolean
    private format: LogFormat
    private correlationId: string | undefined

    constructor(enabled: boolean, format: LogFormat = "text", logDir: string = DEFAULT_LOG_DIR) {
        this.enabled = enabled
        this.format = format
        this.logDir = logDir
    }

    /**
     * Set a correlation ID for tracing related log entries,
     * e.g. one per batch of files being hashed.
     */
    setCorrelationId(id: string): void {
        this.correlationId = id
    }

    getCorrelationId(): string | undefined {
        return this.correlationId
    }

    setFormat(format: LogFormat): void {
        this.format = format
    }

    /**
     * Path of the file entries written today go to.
     */
    getLogFile(now: Date = new Date()): string {
        return join(this.logDir, "daily", `${now.toISOString().split("T")[0]}.log`)
    }

    private formatData(data?: Record<string, unknown>): string {
        if (!data) return ""

        const parts: string[] = []
        for (const [key, value] of Object.entries(data)) {
            if (value === undefined || value === null) continue

            // Format arrays compactly
            if (Array.isArray(value)) {
                if (value.length === 0) continue
                parts.push(
                    `${key}=[${value.slice(0, 3).join(",")}${value.length > 3 ? `...+${value.length - 3}` : ""}]`,
                )
            } else if (typeof value === "object") {
                const str = JSON.stringify(value)
                if (str.length < 50) {
                    parts.push(`${key}=${str}`)
                }
            } else {
                parts.push(`${key}=${String(value)}`)
            }
        }
        return parts.join(" ")
    }

    private getCallerFile(skipFrames: number = 3): string {
        const originalPrepareStackTrace = Error.prepareStackTrace
        try {
            const err = new Error()
            Error.prepareStackTrace = (_, stack) => stack
            const stack = err.stack as unknown as NodeJS.CallSite[]
            Error.prepareStackTrace = originalPrepareStackTrace

            // Skip specified number of frames to get to actual caller
            for (let i = skipFrames; i < stack.length; i++) {
                const filename = stack[i]?.getFileName()
                if (filename && !filename.includes("/logger.")) {
                    const match = filename.match(/([^/\\]+)\.[tj]s$/)
                    return match?.[1] ?? filename
                }
            }
            return "unknown"
        } catch {
            return "unknown"
        } finally {
            Error.prepareStackTrace = originalPrepareStackTrace
        }
    }

    private formatLine(
        level: LogLevel,
        component: string,
        message: string,
        data?: Record<string, unknown>,
    ): string {
        const timestamp = new Date().toISOString()

        if (this.format === "json") {
            const entry: LogEntry = {
                timestamp,
                level,
                component,
                message,
                ...(this.correlationId && { correlationId: this.correlationId }),
                ...(data && { data }),
            }
            return JSON.stringify(entry) + "\n"
        }

        const dataStr = this.formatData(data)
        const correlationStr = this.correlationId ? `[${this.correlationId.slice(0, 8)}] ` : ""
        return `${timestamp} ${level.padEnd(5)} ${correlationStr}${component}: ${message}${dataStr ? " | " + dataStr : ""}\n`
    }

    private write(
        level: LogLevel,
        component: string,
        message: string,
        data?: Record<string, unknown>,
    ): void {
        if (!this.enabled) return

        const logFile = this.getLogFile()
        try {
            const dailyLogDir = join(this.logDir, "daily")
            if (!existsSync(dailyLogDir)) {
                mkdirSync(dailyLogDir, { recursive: true })
            }
            appendFileSync(logFile, this.formatLine(level, component, message, data))
        } catch (error) {
            // Logging must never break the caller; stop trying after the first failure
            this.enabled = false
            process.emitWarning(
                `Logging disabled, could not write ${logFile}: ${error instanceof Error ? error.message : String(error)}`,
            )
        }
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.write("INFO", this.getCallerFile(2), message, data)
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.write("DEBUG", this.getCallerFile(2), message, data)
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.write("WARN", this.getCallerFile(2), message, data)
    }

    error(message: string, data?: Record<string, unknown>): void {
        this.write("ERROR", this.getCallerFile(2), message, data)
    }
}
