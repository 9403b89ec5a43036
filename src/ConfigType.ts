import type { LogLevelName } from "./LogLevelName";

export interface ConfigType {
    name: string | null;
    interfaces: string[];
    pollInterval: number;
    logging: {
        level: LogLevelName;
        file: string | null;
    };
}
