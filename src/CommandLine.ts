import type { LogLevelName } from "./LogLevelName";

export interface CommandLine {
    name?: string;
    interfaces?: string[];
    pollInterval?: number;
    logLevel?: LogLevelName;
    logFile?: string;
    verbose: number;
    config?: string;
    help: boolean;
    version: boolean;
}
