import { readFileSync } from "fs";
import { parse } from "dotenv";
import { INFO, LogLevel, isLogLevel } from "../logging/log-levels";

export type LoggingConfig = {
    level: LogLevel; // Default: info
    identifier: string; // Reported as the `service` field of every record
    isService: boolean; // Default: false. JSON lines instead of console text.
};

export type ListConfig = {
    logging: LoggingConfig;
};

export type Environment = Record<string, string | undefined>;

export const DEFAULT_CONFIG: ListConfig = {
    logging: {
        level: INFO,
        identifier: "linked-list",
        isService: false,
    },
};

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined || value === "") {
        return fallback;
    }

    const valueLc = value.toLowerCase();

    return valueLc === "true" || valueLc === "1" || valueLc === "yes";
}

/**
 * Builds the configuration from environment variables, falling back to `DEFAULT_CONFIG` for anything unset.
 *
 * @param env Variables to read, `process.env` unless given.
 * @throws If `LINKED_LIST_LOG_LEVEL` is not a syslog level.
 */
export function loadConfig(env: Environment = process.env): ListConfig {
    const level = env.LINKED_LIST_LOG_LEVEL?.toLowerCase() || DEFAULT_CONFIG.logging.level;
    if (!isLogLevel(level)) {
        throw new Error("LINKED_LIST_LOG_LEVEL must be one of the syslog levels, got: " + level);
    }

    return {
        logging: {
            level: level,
            identifier: env.LINKED_LIST_LOG_IDENTIFIER || DEFAULT_CONFIG.logging.identifier,
            isService: parseBoolean(env.LINKED_LIST_LOG_SERVICE, DEFAULT_CONFIG.logging.isService),
        },
    };
}

/**
 * Reads a dotenv file without touching `process.env` and builds the configuration from it.
 */
export function loadConfigFile(path: string): ListConfig {
    return loadConfig(parse(readFileSync(path)));
}
