import { ChangeDetectionLoop } from "./ChangeDetectionLoop";
import { MulticastDnsAdvertiser } from "./MulticastDnsAdvertiser";
import { ServiceLifecycleManager } from "./ServiceLifecycleManager";
import { describeInterfaceFilter } from "./describeInterfaceFilter";
import { enumerateInterfaces } from "./enumerateInterfaces";
import { interfaceFilterFromValues } from "./interfaceFilterFromValues";
import { log } from "./log";
import type { Config } from "./Config";

export async function main(config: Config): Promise<void> {
    const filter = interfaceFilterFromValues(config.interfaces);
    log(`config loaded: name=${config.name}, interfaces=${describeInterfaceFilter(filter)}`);

    const controller = new AbortController();
    const onSignal = (signal: NodeJS.Signals): void => {
        log(`received ${signal}, shutting down`);
        controller.abort();
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);

    const loop = new ChangeDetectionLoop({
        name: config.name,
        filter,
        enumerate: enumerateInterfaces,
        lifecycle: new ServiceLifecycleManager(new MulticastDnsAdvertiser({ enumerate: enumerateInterfaces })),
        pollIntervalMs: config.pollIntervalMs
    });

    try {
        await loop.run(controller.signal);
    } finally {
        process.off("SIGINT", onSignal);
        process.off("SIGTERM", onSignal);
    }
}
