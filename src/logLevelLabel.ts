import { LogLevel } from "./LogLevel";

export function logLevelLabel(level: LogLevel): string {
    switch (level) {
        case LogLevel.Verbose:
            return "VERBOSE";
        case LogLevel.Debug:
            return "DEBUG";
        case LogLevel.Log:
            return "INFO";
        case LogLevel.Warn:
            return "WARN";
        case LogLevel.Error:
            return "ERROR";
        case LogLevel.Silent:
            return "SILENT";
    }
}
