import { LogLevel } from "./LogLevel";
import type { LogLevelName } from "./LogLevelName";

export function logLevelFromName(name: LogLevelName): LogLevel {
    switch (name) {
        case "silent":
            return LogLevel.Silent;
        case "error":
            return LogLevel.Error;
        case "warn":
            return LogLevel.Warn;
        case "log":
            return LogLevel.Log;
        case "debug":
            return LogLevel.Debug;
        case "verbose":
            return LogLevel.Verbose;
    }
}
