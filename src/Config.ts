import { ConfigFileSchema } from "./ConfigFileSchema";
import { ConfigurationError } from "./ConfigurationError";
import { createConfigSchema } from "./configSchema";
import { debug } from "./debug";
import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { parseCommandLine } from "./parseCommandLine";
import path from "path";
import type { CommandLine } from "./CommandLine";
import type { ConfigType } from "./ConfigType";
import type { LogLevelName } from "./LogLevelName";
import type { ZodIssue } from "zod";
import type convict from "convict";

/**
 * Layered daemon configuration: schema defaults, then the config file, then
 * MDNSD_* environment variables, then the command line.
 */
export class Config {
    #convictConfig: convict.Config<ConfigType>;
    #commandLine: CommandLine;
    #configPath: string | null;

    constructor(
        commandLine: CommandLine = parseCommandLine(process.argv.slice(2)),
        env: NodeJS.ProcessEnv = process.env,
        searchPaths: string[] = Config.getDefaultConfigPaths()
    ) {
        this.#commandLine = commandLine;
        this.#convictConfig = createConfigSchema(env);
        this.#configPath = Config.#findConfigPath(this.#commandLine.config, searchPaths);
        if (this.#configPath) {
            this.#loadConfig(this.#configPath);
        }
        this.#applyCommandLine(this.#commandLine);
        this.#validate();
    }

    get name(): string {
        return (this.#convictConfig.get("name") ?? "").trim();
    }

    get interfaces(): string[] {
        return this.#convictConfig.get("interfaces");
    }

    // Milliseconds, the schema stores seconds
    get pollIntervalMs(): number {
        return this.#convictConfig.get("pollInterval") * 1000;
    }

    get logLevel(): LogLevelName {
        return this.#convictConfig.get("logging.level");
    }

    get logFile(): string | null {
        return this.#convictConfig.get("logging.file");
    }

    get configPath(): string | null {
        return this.#configPath;
    }

    static getDefaultConfigPaths(): string[] {
        const homeDir = homedir();
        return [
            path.join(process.cwd(), "mdnsd.config.json"),
            path.join(process.cwd(), ".mdnsdrc.json"),
            path.join(process.cwd(), ".mdnsdrc"),
            path.join(homeDir, ".config", "mdnsd", "config.json"),
            path.join(homeDir, ".mdnsdrc.json")
        ];
    }

    static #findConfigPath(explicitPath: string | undefined, searchPaths: string[]): string | null {
        if (explicitPath !== undefined) {
            if (!existsSync(explicitPath)) {
                throw new ConfigurationError(`config file not found: ${explicitPath}`);
            }
            debug(`Using config file from CLI: ${explicitPath}`);
            return explicitPath;
        }

        for (const configPath of searchPaths) {
            if (existsSync(configPath)) {
                debug(`Found config file: ${configPath}`);
                return configPath;
            }
        }

        debug("No config file found, using defaults");
        return null;
    }

    #loadConfig(configPath: string): void {
        let data: unknown;
        try {
            data = JSON.parse(readFileSync(configPath, "utf8"));
        } catch (err) {
            throw new ConfigurationError(`failed to read config file ${configPath}: ${err}`);
        }

        const parsed = ConfigFileSchema.safeParse(data);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(
                (issue: ZodIssue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`
            );
            throw new ConfigurationError(`invalid config file ${configPath}: ${issues.join("; ")}`);
        }

        const { interfaces, ...rest } = parsed.data;
        this.#convictConfig.load({
            ...rest,
            ...(interfaces === undefined ? {} : { interfaces: typeof interfaces === "string" ? [interfaces] : interfaces })
        });
        debug(`Loaded config from: ${configPath}`);
    }

    #applyCommandLine(commandLine: CommandLine): void {
        if (commandLine.name !== undefined) {
            this.#convictConfig.set("name", commandLine.name);
            debug(`CLI override: name = ${commandLine.name}`);
        }

        if (commandLine.interfaces !== undefined) {
            this.#convictConfig.set("interfaces", commandLine.interfaces);
            debug(`CLI override: interfaces = ${commandLine.interfaces.join(",")}`);
        }

        if (commandLine.pollInterval !== undefined) {
            this.#convictConfig.set("pollInterval", commandLine.pollInterval);
            debug(`CLI override: poll-interval = ${commandLine.pollInterval}`);
        }

        if (commandLine.verbose === 1) {
            this.#convictConfig.set("logging.level", "debug");
            debug("CLI override: 1 verbose flag - log-level = debug");
        } else if (commandLine.verbose >= 2) {
            this.#convictConfig.set("logging.level", "verbose");
            debug(`CLI override: ${commandLine.verbose} verbose flags - log-level = verbose`);
        }

        if (commandLine.logLevel !== undefined) {
            this.#convictConfig.set("logging.level", commandLine.logLevel);
            debug(`CLI override: log-level = ${commandLine.logLevel}`);
        }

        if (commandLine.logFile !== undefined) {
            this.#convictConfig.set("logging.file", commandLine.logFile);
            debug(`CLI override: log-file = ${commandLine.logFile}`);
        }
    }

    #validate(): void {
        try {
            this.#convictConfig.validate({ allowed: "strict" });
        } catch (err) {
            throw new ConfigurationError(`invalid configuration: ${err instanceof Error ? err.message : err}`);
        }
        if (!this.name) {
            throw new ConfigurationError("missing required name. use --name <name> or positional <name>");
        }
    }
}
