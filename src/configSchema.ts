import { DEFAULT_POLL_INTERVAL } from "./DEFAULT_POLL_INTERVAL";
import { LogLevelNameSchema } from "./LogLevelNameSchema";
import { format } from "util";
import convict from "convict";
import type { ConfigType } from "./ConfigType";

convict.addFormat({
    name: "nullable-string",
    validate: (val: unknown): void => {
        if (val === null) {
            return;
        }
        if (typeof val !== "string") {
            throw new Error("must be null or a string");
        }
    },
    coerce: (val: unknown): unknown => {
        if (val === null) {
            return null;
        }
        if (typeof val === "string") {
            return val;
        }
        return format(val);
    }
});

convict.addFormat({
    name: "positive-number",
    validate: (val: unknown): void => {
        if (typeof val !== "number" || !Number.isFinite(val) || val <= 0) {
            throw new Error("must be a positive number");
        }
    },
    coerce: (val: unknown): number => Number(val)
});

// Command line arguments are applied by Config on top of this, never by convict itself
export function createConfigSchema(env: NodeJS.ProcessEnv): convict.Config<ConfigType> {
    return convict<ConfigType>(
        {
            name: {
                doc: "Host name to advertise, resolves as <name>.local",
                format: "nullable-string",
                default: null,
                env: "MDNSD_NAME"
            },
            interfaces: {
                doc: "Interfaces to advertise on, '*' for every non-loopback interface",
                format: Array,
                default: ["*"],
                env: "MDNSD_INTERFACES"
            },
            pollInterval: {
                doc: "Seconds between interface polls",
                format: "positive-number",
                default: DEFAULT_POLL_INTERVAL,
                env: "MDNSD_POLL_INTERVAL"
            },
            logging: {
                level: {
                    doc: "Log level",
                    format: [...LogLevelNameSchema.options],
                    default: "log",
                    env: "MDNSD_LOG_LEVEL"
                },
                file: {
                    doc: "Log file path",
                    format: "nullable-string",
                    default: null,
                    env: "MDNSD_LOG_FILE"
                }
            }
        },
        { env, args: [] }
    );
}
