// Syslog severities, as used by winston.config.syslog.levels
export const EMERG = "emerg";
export const ALERT = "alert";
export const CRIT = "crit";
export const ERROR = "error";
export const WARNING = "warning";
export const NOTICE = "notice";
export const INFO = "info";
export const DEBUG = "debug";

export const LOG_LEVELS = [EMERG, ALERT, CRIT, ERROR, WARNING, NOTICE, INFO, DEBUG] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}
