import { ILogObj, Logger as TsLogger } from "tslog"

/**
 * tslog levels: 0 silly, 1 trace, 2 debug, 3 info, 4 warn, 5 error, 6 fatal
 */
export const LOG_LEVEL_DEBUG = 2
export const LOG_LEVEL_INFO = 3
export const LOG_LEVEL_WARN = 4

export const LOG_LEVEL_ENV_VAR = "AZURE_DOCKER_VM_LOG_LEVEL"

function initialLogLevel(): number {
    const raw = process.env[LOG_LEVEL_ENV_VAR]
    const parsed = raw === undefined ? NaN : Number.parseInt(raw)
    return isNaN(parsed) ? LOG_LEVEL_WARN : parsed
}

export type Logger = TsLogger<ILogObj>

const rootLogger: Logger = new TsLogger<ILogObj>({
    name: "azure-docker-vm",
    minLevel: initialLogLevel(),
    type: "pretty",
    prettyLogTemplate: "{{logLevelName}}\t[{{name}}]\t",
    hideLogPositionForProduction: true,
})

const subLoggers = new Map<string, Logger>()

/**
 * One sub logger per name, shared by every caller asking for it
 */
export function getLogger(name: string): Logger {
    const existing = subLoggers.get(name)
    if (existing) {
        return existing
    }
    const logger = rootLogger.getSubLogger({ name: name })
    subLoggers.set(name, logger)
    return logger
}

/**
 * Change verbosity of every logger created so far and of loggers created afterwards.
 */
export function setLogVerbosity(level: number) {
    rootLogger.settings.minLevel = level
    for (const logger of subLoggers.values()) {
        logger.settings.minLevel = level
    }
}
