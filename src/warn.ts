import { LogLevel } from "./LogLevel";
import { doLog } from "./doLog";

export function warn(...args: unknown[]): void {
    doLog(LogLevel.Warn, args);
}
