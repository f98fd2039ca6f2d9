import { ILogObj, Logger as TsLogger } from 'tslog'
import { ENV_LOG_LEVEL } from '../core/const'

export type Logger = TsLogger<ILogObj>

/**
 * tslog levels: 0 silly, 1 trace, 2 debug, 3 info, 4 warn, 5 error, 6 fatal
 */
const LOG_LEVEL_NAMES: Record<string, number> = {
    silly: 0,
    trace: 1,
    debug: 2,
    info: 3,
    warn: 4,
    error: 5,
    fatal: 6,
}

const DEFAULT_LOG_LEVEL = 3

/**
 * Parse a log level given either as a tslog number or a level name.
 * Returns undefined for anything unrecognized.
 */
export function parseLogLevel(raw: string | undefined): number | undefined {
    if (raw === undefined) return undefined
    const normalized = raw.trim().toLowerCase()
    if (normalized === '') return undefined
    if (/^[0-6]$/.test(normalized)) return Number(normalized)
    return LOG_LEVEL_NAMES[normalized]
}

let currentLevel = parseLogLevel(process.env[ENV_LOG_LEVEL]) ?? DEFAULT_LOG_LEVEL
const loggers: Logger[] = []

export function getLogger(name: string): Logger {
    const logger: Logger = new TsLogger<ILogObj>({
        name: name,
        minLevel: currentLevel,
        type: 'pretty',
        prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}}\t[{{name}}] ',
    })
    loggers.push(logger)
    return logger
}

/**
 * Change minimum level of every logger, existing ones included.
 */
export function setLogVerbosity(level: number): void {
    currentLevel = level
    for (const logger of loggers) {
        logger.settings.minLevel = level
    }
}

export function getLogVerbosity(): number {
    return currentLevel
}
