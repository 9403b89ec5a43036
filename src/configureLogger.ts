import { LogLevel } from "./LogLevel";
import { createWriteStream, mkdirSync } from "fs";
import path from "path";
import type { LoggerOptions } from "./LoggerOptions";
import type { WriteStream } from "fs";

let consoleLevel: LogLevel = LogLevel.Log;
let logStream: WriteStream | undefined;

/**
 * Applies whichever settings are present. Switching log files ends the
 * previous stream without waiting for it; use closeLogger() to flush.
 */
export function configureLogger(options: LoggerOptions): void {
    if (options.consoleLevel !== undefined) {
        consoleLevel = options.consoleLevel;
    }

    if (options.logFile !== undefined) {
        logStream?.end();
        logStream = undefined;
        if (options.logFile) {
            mkdirSync(path.dirname(options.logFile), { recursive: true });
            logStream = createWriteStream(options.logFile, { flags: "a" });
        }
    }
}

export function consoleThreshold(): LogLevel {
    return consoleLevel;
}

export function currentLogStream(): WriteStream | undefined {
    return logStream;
}

export function detachLogStream(): WriteStream | undefined {
    const stream = logStream;
    logStream = undefined;
    return stream;
}
