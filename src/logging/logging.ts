import { config as winstonConfig, createLogger, format, transports, Logger } from "winston";
import TransportStream from "winston-transport";
import { hostname } from "os";
import { INFO } from "./log-levels";
import { DEFAULT_CONFIG } from "../config/list-config";

let logger: Logger | undefined = undefined;

/**
 * Creates the process-wide logger.
 *
 * Service mode writes one JSON document per line so that a log collector can pick the records up; otherwise a
 * human readable line is printed to the console.
 *
 * @param isService Whether the process runs unattended.
 * @param identifier Name reported as the `service` metadata field.
 * @param level Most verbose syslog level that is still written.
 * @param extraTransports Transports attached next to the console.
 * @returns The new logger, also returned by `getLogger` from now on.
 */
export function initializeLogging(
    isService: boolean,
    identifier: string,
    level: string = INFO,
    extraTransports: TransportStream[] = [],
): Logger {
    const defaultMetadata = {
        instance: hostname(),
        service: identifier,
    };

    if (isService) {
        logger = createLogger({
            levels: winstonConfig.syslog.levels,
            level: level,
            format: format.combine(format.errors({ stack: true }), format.timestamp(), format.splat(), format.json()),
            defaultMeta: defaultMetadata,
            transports: [new transports.Console(), ...extraTransports],
        });
    } else {
        logger = createLogger({
            levels: winstonConfig.syslog.levels,
            level: level,
            format: format.combine(
                format.errors({ stack: true }),
                format.timestamp({
                    format: "YYYY-MM-DD HH:mm:ss.SSS",
                }),
                format.splat(),
                format.printf((info) => {
                    let logMessage = `${info.level.toUpperCase()} [${info.timestamp}] ${info.message}`;
                    if (info.stack) {
                        // Append stack trace if available
                        logMessage += `\n${info.stack}`;
                    }
                    return logMessage;
                }),
            ),
            defaultMeta: defaultMetadata,
            transports: [new transports.Console(), ...extraTransports],
        });
    }

    return logger;
}

/**
 * Returns the process-wide logger. Until the application calls `initializeLogging`, this is a console logger
 * built from `DEFAULT_CONFIG`; the environment is only read when the application asks for it with `loadConfig`.
 */
export function getLogger(): Logger {
    if (logger === undefined) {
        const { logging } = DEFAULT_CONFIG;
        logger = initializeLogging(logging.isService, logging.identifier, logging.level);
    }

    return logger;
}

/**
 * Drops the current logger so that the next `getLogger` call starts over from the defaults.
 */
export function resetLogging(): void {
    logger?.close();
    logger = undefined;
}
