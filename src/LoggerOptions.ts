import type { LogLevel } from "./LogLevel";

export interface LoggerOptions {
    consoleLevel?: LogLevel;
    // null detaches the current log file
    logFile?: string | null;
}
