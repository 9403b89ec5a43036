#!/usr/bin/env node

import { Config } from "./Config";
import { ConfigurationError } from "./ConfigurationError";
import { VERSION } from "./VERSION";
import { closeLogger } from "./closeLogger";
import { configureLogger } from "./configureLogger";
import { logLevelFromName } from "./logLevelFromName";
import { main } from "./main";
import { parseCommandLine } from "./parseCommandLine";
import { usage } from "./usage";
import type { CommandLine } from "./CommandLine";

function exitWithUsage(err: unknown): never {
    if (err instanceof ConfigurationError) {
        console.error(`argument error: ${err.message}`);
        console.error(usage());
        process.exit(2);
    }
    console.error("Failed to load configuration:", err);
    process.exit(1);
}

let commandLine: CommandLine;
try {
    commandLine = parseCommandLine(process.argv.slice(2));
} catch (err) {
    exitWithUsage(err);
}

if (commandLine.help) {
    console.log(usage());
    process.exit(0);
}

if (commandLine.version) {
    console.log(`mdnsd version ${VERSION}`);
    process.exit(0);
}

let config: Config;
try {
    config = new Config(commandLine);
} catch (err) {
    exitWithUsage(err);
}

configureLogger({ consoleLevel: logLevelFromName(config.logLevel), logFile: config.logFile });

void (async (): Promise<void> => {
    try {
        await main(config);
        await closeLogger();
        process.exit(0);
    } catch (err: unknown) {
        console.error("Fatal error:", err);
        await closeLogger();
        process.exit(1);
    }
})();
