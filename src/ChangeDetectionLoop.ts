import { LoopState } from "./LoopState";
import { collectMissingInterfaces } from "./collectMissingInterfaces";
import { collectSnapshot } from "./collectSnapshot";
import { debug } from "./debug";
import { error } from "./error";
import { formatSnapshot } from "./formatSnapshot";
import { log } from "./log";
import { snapshotsEqual } from "./snapshotsEqual";
import { wait } from "./wait";
import { warn } from "./warn";
import type { ChangeDetectionLoopOptions } from "./ChangeDetectionLoopOptions";
import type { InterfaceEnumerator } from "./InterfaceEnumerator";
import type { InterfaceFilter } from "./InterfaceFilter";
import type { InterfaceSnapshot } from "./InterfaceSnapshot";
import type { ServiceLifecycleManager } from "./ServiceLifecycleManager";
import type { WaitFunction } from "./WaitFunction";

/**
 * Polls the host's interfaces and restarts the responder whenever the
 * filtered view changes.
 *
 * Ticks and shutdown never overlap: `run` awaits each tick before it waits
 * for the next one, and cancellation is only looked at while waiting. A
 * failed refresh keeps the previous snapshot; a failed restart leaves the
 * daemon without a responder until the interfaces change again.
 */
export class ChangeDetectionLoop {
    #name: string;
    #filter: InterfaceFilter;
    #enumerate: InterfaceEnumerator;
    #lifecycle: ServiceLifecycleManager;
    #pollIntervalMs: number;
    #wait: WaitFunction;
    #state: LoopState = LoopState.Idle;
    #snapshot: InterfaceSnapshot = [];
    #shutdown: Promise<void> | undefined;
    #inFlightTick: Promise<void> | undefined;

    constructor(options: ChangeDetectionLoopOptions) {
        this.#name = options.name;
        this.#filter = options.filter;
        this.#enumerate = options.enumerate;
        this.#lifecycle = options.lifecycle;
        this.#pollIntervalMs = options.pollIntervalMs;
        this.#wait = options.wait ?? wait;
    }

    get state(): LoopState {
        return this.#state;
    }

    get snapshot(): InterfaceSnapshot {
        return this.#snapshot;
    }

    /**
     * Takes the first snapshot and starts the responder. Any failure here is
     * fatal to the daemon and is rethrown.
     */
    async start(): Promise<void> {
        if (this.#state !== LoopState.Idle) {
            throw new Error(`Cannot start change detection loop in state ${this.#state}`);
        }
        this.#state = LoopState.Starting;

        try {
            this.#reportMissingInterfaces();

            const snapshot = collectSnapshot(this.#filter, this.#enumerate);
            if (snapshot.length === 0) {
                warn("no matching non-loopback interfaces at startup");
            }
            debug(`initial interface snapshot=${formatSnapshot(snapshot)}`);
            this.#snapshot = snapshot;

            await this.#lifecycle.ensureRunning(this.#name, this.#filter, snapshot);
        } catch (err) {
            this.#state = LoopState.Stopped;
            throw err;
        }

        this.#state = LoopState.Running;
    }

    /**
     * Re-collects the snapshot and restarts the responder if it changed. A
     * shutdown requested meanwhile waits for the tick to finish.
     */
    tick(): Promise<void> {
        const tick = this.#tick();
        this.#inFlightTick = tick;
        return tick.finally(() => {
            if (this.#inFlightTick === tick) {
                this.#inFlightTick = undefined;
            }
        });
    }

    async #tick(): Promise<void> {
        if (this.#state !== LoopState.Running) {
            debug(`ignoring tick in state ${this.#state}`);
            return;
        }

        let current: InterfaceSnapshot;
        try {
            current = collectSnapshot(this.#filter, this.#enumerate);
        } catch (err) {
            warn("failed to refresh interface list:", err);
            return;
        }

        if (snapshotsEqual(current, this.#snapshot)) {
            return;
        }

        log("network interface change detected, restarting mdns responder");
        debug(`old_snapshot=${formatSnapshot(this.#snapshot)}`);
        debug(`new_snapshot=${formatSnapshot(current)}`);
        this.#snapshot = current;

        if (current.length === 0) {
            warn("no matching non-loopback interfaces after change");
        }
        this.#reportMissingInterfaces();

        try {
            await this.#lifecycle.ensureRunning(this.#name, this.#filter, current);
            log("mdns responder restarted");
        } catch (err) {
            error("failed to restart mdns responder:", err);
        }
    }

    async run(signal: AbortSignal): Promise<void> {
        await this.start();

        while (!signal.aborted) {
            const fired = await this.#wait(this.#pollIntervalMs, signal);
            if (!fired) {
                break;
            }
            await this.tick();
        }

        await this.shutdown();
    }

    shutdown(): Promise<void> {
        if (!this.#shutdown) {
            this.#shutdown = this.#stop();
        }
        return this.#shutdown;
    }

    async #stop(): Promise<void> {
        this.#state = LoopState.ShuttingDown;
        try {
            await this.#inFlightTick;
            await this.#lifecycle.shutdown();
        } finally {
            this.#state = LoopState.Stopped;
        }
    }

    // Advisory, only fatal while starting
    #reportMissingInterfaces(): void {
        let missing: string[];
        try {
            missing = collectMissingInterfaces(this.#filter, this.#enumerate);
        } catch (err) {
            if (this.#state === LoopState.Starting) {
                throw err;
            }
            debug("failed to check for missing interfaces:", err);
            return;
        }
        if (missing.length > 0) {
            warn(`requested interfaces not found: ${missing.join(",")}`);
        }
    }
}
