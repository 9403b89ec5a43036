import { LogLevel } from "./LogLevel";
import { consoleThreshold, currentLogStream } from "./configureLogger";
import { formatLogLine } from "./formatLogLine";
import { logLevelLabel } from "./logLevelLabel";

export function doLog(level: LogLevel, args: unknown[]): void {
    // The file gets every level, the console only what passes the threshold
    currentLogStream()?.write(formatLogLine(logLevelLabel(level), args) + "\n");

    if (level < consoleThreshold()) {
        return;
    }
    switch (level) {
        case LogLevel.Error:
            console.error(...args);
            break;
        case LogLevel.Warn:
            console.warn(...args);
            break;
        default:
            console.log(...args);
            break;
    }
}
