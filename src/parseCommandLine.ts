import { ConfigurationError } from "./ConfigurationError";
import { LogLevelNameSchema } from "./LogLevelNameSchema";
import yargs from "yargs";
import type { CommandLine } from "./CommandLine";

function resolveName(named: string[] | undefined, positional: string[]): string | undefined {
    let name: string | undefined;
    if (named && named.length > 0) {
        if (positional.length > 0) {
            throw new ConfigurationError(`unexpected positional arguments: ${positional.join(" ")}`);
        }
        name = named[named.length - 1];
    } else if (positional.length > 1) {
        throw new ConfigurationError(`too many positional arguments: ${positional.join(" ")}`);
    } else {
        name = positional[0];
    }

    if (name === undefined) {
        return undefined;
    }
    const trimmed = name.trim();
    if (!trimmed) {
        throw new ConfigurationError("name cannot be empty");
    }
    return trimmed;
}

export function parseCommandLine(args: string[]): CommandLine {
    const argv = yargs(args)
        .help(false)
        .version(false)
        .parserConfiguration({ "parse-positional-numbers": false, "greedy-arrays": false })
        .option("name", {
            alias: "n",
            type: "string",
            array: true,
            description: "Host name, resolves as <name>.local"
        })
        .option("interface", {
            alias: "i",
            type: "string",
            array: true,
            description: "Interface name, repeatable. Default is '*' (all)"
        })
        .option("poll-interval", {
            type: "number",
            description: "Seconds between interface polls"
        })
        .option("log-level", {
            alias: "l",
            type: "string",
            choices: [...LogLevelNameSchema.options],
            description: "Logging level"
        })
        .option("log-file", {
            alias: "f",
            type: "string",
            description: "Log file path"
        })
        .option("verbose", {
            alias: "v",
            type: "count",
            description: "Enable verbose logging (use -v for debug, -vv for verbose)"
        })
        .option("config", {
            alias: "c",
            type: "string",
            description: "Path to config file"
        })
        .option("help", { alias: "h", type: "boolean" })
        .option("version", { type: "boolean" })
        .strictOptions()
        .exitProcess(false)
        .fail((message: string, err: Error | undefined) => {
            throw new ConfigurationError(err ? err.message : message);
        })
        .parseSync();

    const positional = argv._.map(String);
    const commandLine: CommandLine = {
        verbose: argv.verbose,
        help: argv.help === true,
        version: argv.version === true
    };

    const name = resolveName(argv.name, positional);
    if (name !== undefined) {
        commandLine.name = name;
    }

    if (argv.interface) {
        if (argv.interface.some((value: string) => !value.trim())) {
            throw new ConfigurationError("empty value for --interface");
        }
        commandLine.interfaces = argv.interface;
    }

    const pollInterval = argv["poll-interval"];
    if (pollInterval !== undefined) {
        if (!Number.isFinite(pollInterval) || pollInterval <= 0) {
            throw new ConfigurationError("--poll-interval must be a positive number of seconds");
        }
        commandLine.pollInterval = pollInterval;
    }

    const logLevel = argv["log-level"];
    if (logLevel !== undefined) {
        commandLine.logLevel = LogLevelNameSchema.parse(logLevel);
    }

    if (argv["log-file"] !== undefined) {
        commandLine.logFile = argv["log-file"];
    }

    if (argv.config !== undefined) {
        commandLine.config = argv.config;
    }

    return commandLine;
}
