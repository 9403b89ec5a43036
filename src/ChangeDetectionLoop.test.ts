import { AdvertisementError } from "./AdvertisementError";
import { ChangeDetectionLoop } from "./ChangeDetectionLoop";
import { InterfaceEnumerationError } from "./InterfaceEnumerationError";
import { LoopState } from "./LoopState";
import { RecordingAdvertiser } from "./testing/RecordingAdvertiser";
import { ScriptedEnumerator } from "./testing/ScriptedEnumerator";
import { ServiceLifecycleManager } from "./ServiceLifecycleManager";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { interfaceEntry } from "./testing/interfaceEntry";
import { interfaceFilterFromValues } from "./interfaceFilterFromValues";
import type { InterfaceFilter } from "./InterfaceFilter";
import type { WaitFunction } from "./WaitFunction";

const loopback = interfaceEntry("lo", "127.0.0.1", { internal: true });

describe("ChangeDetectionLoop", () => {
    let enumerator: ScriptedEnumerator;
    let advertiser: RecordingAdvertiser;
    let lifecycle: ServiceLifecycleManager;

    function createLoop(filter: InterfaceFilter = interfaceFilterFromValues([]), wait?: WaitFunction): ChangeDetectionLoop {
        return new ChangeDetectionLoop({
            name: "box",
            filter,
            enumerate: enumerator.enumerate,
            lifecycle,
            pollIntervalMs: 3000,
            wait
        });
    }

    function ops(): string[] {
        return advertiser.calls.map((call: { op: string }) => call.op);
    }

    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => {});
        vi.spyOn(console, "warn").mockImplementation(() => {});
        vi.spyOn(console, "error").mockImplementation(() => {});
        enumerator = new ScriptedEnumerator([interfaceEntry("eth0", "10.0.0.5"), loopback]);
        advertiser = new RecordingAdvertiser();
        lifecycle = new ServiceLifecycleManager(advertiser);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe("start", () => {
        it("takes the first snapshot and starts the responder", async () => {
            const loop = createLoop();

            await loop.start();

            expect(loop.state).toBe(LoopState.Running);
            expect(loop.snapshot).toEqual([{ name: "eth0", address: "10.0.0.5" }]);
            expect(advertiser.calls).toEqual([{ op: "start", hostname: "box.local", addresses: [] }]);
        });

        it("starts anyway when none of the requested interfaces exist", async () => {
            const loop = createLoop(interfaceFilterFromValues(["wlan0"]));

            await loop.start();

            expect(loop.snapshot).toEqual([]);
            expect(advertiser.calls).toEqual([{ op: "start", hostname: "box.local", addresses: [] }]);
            expect(console.warn).toHaveBeenCalledWith("requested interfaces not found: wlan0");
            expect(console.warn).toHaveBeenCalledWith("no matching non-loopback interfaces at startup");
        });

        it("fails when the interfaces cannot be listed", async () => {
            enumerator.failure = new Error("netlink unavailable");
            const loop = createLoop();

            await expect(loop.start()).rejects.toThrow(InterfaceEnumerationError);
            expect(loop.state).toBe(LoopState.Stopped);
            expect(advertiser.calls).toEqual([]);
        });

        it("fails when the first responder cannot start", async () => {
            advertiser.startError = new Error("address in use");
            const loop = createLoop();

            await expect(loop.start()).rejects.toThrow(AdvertisementError);
            expect(loop.state).toBe(LoopState.Stopped);
            expect(lifecycle.running).toBe(false);
        });

        it("can only be started once", async () => {
            const loop = createLoop();
            await loop.start();

            await expect(loop.start()).rejects.toThrow("Cannot start change detection loop in state running");
        });
    });

    describe("tick", () => {
        it("does nothing while the interfaces stay the same", async () => {
            const loop = createLoop();
            await loop.start();
            const held = loop.snapshot;

            enumerator.current = [loopback, interfaceEntry("eth0", "10.0.0.5")];
            await loop.tick();
            await loop.tick();

            expect(ops()).toEqual(["start"]);
            expect(loop.snapshot).toBe(held);
        });

        it("keeps the held snapshot when the refresh fails", async () => {
            const loop = createLoop();
            await loop.start();
            const held = loop.snapshot;

            enumerator.failure = new Error("netlink unavailable");
            await loop.tick();

            expect(loop.snapshot).toBe(held);
            expect(ops()).toEqual(["start"]);
            expect(loop.state).toBe(LoopState.Running);
            expect(console.warn).toHaveBeenCalledWith(
                "failed to refresh interface list:",
                expect.any(InterfaceEnumerationError)
            );
        });

        it("restarts the responder once when the interfaces change", async () => {
            const loop = createLoop(interfaceFilterFromValues(["eth0"]));
            await loop.start();

            enumerator.current = [interfaceEntry("eth0", "10.0.0.6"), loopback];
            await loop.tick();

            expect(advertiser.calls).toEqual([
                { op: "start", hostname: "box.local", addresses: ["10.0.0.5"] },
                { op: "stop", hostname: "box.local" },
                { op: "start", hostname: "box.local", addresses: ["10.0.0.6"] }
            ]);
            expect(loop.snapshot).toEqual([{ name: "eth0", address: "10.0.0.6" }]);
            expect(console.log).toHaveBeenCalledWith("network interface change detected, restarting mdns responder");
            expect(console.log).toHaveBeenCalledWith("mdns responder restarted");
        });

        it("ignores changes on interfaces outside the filter", async () => {
            const loop = createLoop(interfaceFilterFromValues(["eth0"]));
            await loop.start();

            enumerator.current = [interfaceEntry("eth0", "10.0.0.5"), interfaceEntry("docker0", "172.17.0.1"), loopback];
            await loop.tick();

            expect(ops()).toEqual(["start"]);
        });

        it("keeps the new snapshot after a failed restart and waits for the next change", async () => {
            const loop = createLoop();
            await loop.start();

            enumerator.current = [interfaceEntry("eth0", "10.0.0.6"), loopback];
            advertiser.startError = new Error("bind failed");
            await loop.tick();

            expect(loop.snapshot).toEqual([{ name: "eth0", address: "10.0.0.6" }]);
            expect(lifecycle.running).toBe(false);
            expect(ops()).toEqual(["start", "stop", "start"]);
            expect(console.error).toHaveBeenCalledWith(
                "failed to restart mdns responder:",
                expect.any(AdvertisementError)
            );

            await loop.tick();
            expect(ops()).toEqual(["start", "stop", "start"]);
            expect(loop.state).toBe(LoopState.Running);

            enumerator.current = [interfaceEntry("eth0", "10.0.0.7"), loopback];
            await loop.tick();
            expect(ops()).toEqual(["start", "stop", "start", "start"]);
            expect(lifecycle.running).toBe(true);
        });

        it("warns when a change leaves no matching interfaces", async () => {
            const loop = createLoop();
            await loop.start();

            enumerator.current = [loopback];
            await loop.tick();

            expect(loop.snapshot).toEqual([]);
            expect(ops()).toEqual(["start", "stop", "start"]);
            expect(console.warn).toHaveBeenCalledWith("no matching non-loopback interfaces after change");

            await loop.tick();
            expect(console.warn).toHaveBeenCalledTimes(1);
        });

        it("is ignored once the loop has stopped", async () => {
            const loop = createLoop();
            await loop.start();
            await loop.shutdown();
            const calls = enumerator.calls;

            enumerator.current = [interfaceEntry("eth0", "10.0.0.6")];
            await loop.tick();

            expect(enumerator.calls).toBe(calls);
            expect(ops()).toEqual(["start", "stop"]);
        });
    });

    describe("shutdown", () => {
        it("stops the responder exactly once", async () => {
            const loop = createLoop();
            await loop.start();

            await Promise.all([loop.shutdown(), loop.shutdown()]);
            await loop.shutdown();

            expect(ops()).toEqual(["start", "stop"]);
            expect(loop.state).toBe(LoopState.Stopped);
        });

        it("lets an in-flight restart finish before stopping the responder", async () => {
            const loop = createLoop();
            await loop.start();
            let releaseStop = (): void => {};
            advertiser.beforeStop = (): Promise<void> =>
                new Promise<void>((resolve: () => void) => {
                    releaseStop = resolve;
                });

            enumerator.current = [interfaceEntry("eth0", "10.0.0.6"), loopback];
            const tick = loop.tick();
            const shutdown = loop.shutdown();
            expect(loop.state).toBe(LoopState.ShuttingDown);

            advertiser.beforeStop = undefined;
            releaseStop();
            await Promise.all([tick, shutdown]);

            expect(ops()).toEqual(["start", "stop", "start", "stop"]);
            expect(advertiser.live.size).toBe(0);
            expect(lifecycle.running).toBe(false);
            expect(loop.state).toBe(LoopState.Stopped);
        });

        it("has nothing to stop after a failed restart", async () => {
            const loop = createLoop();
            await loop.start();
            enumerator.current = [loopback];
            advertiser.startError = new Error("bind failed");
            await loop.tick();

            await loop.shutdown();

            expect(ops()).toEqual(["start", "stop", "start"]);
            expect(loop.state).toBe(LoopState.Stopped);
        });
    });

    describe("run", () => {
        it("polls at the configured interval until cancelled", async () => {
            const controller = new AbortController();
            const intervals: number[] = [];
            const wait: WaitFunction = async (ms: number): Promise<boolean> => {
                intervals.push(ms);
                if (intervals.length === 1) {
                    enumerator.current = [interfaceEntry("eth0", "10.0.0.6"), loopback];
                    return true;
                }
                controller.abort();
                return false;
            };
            const loop = createLoop(interfaceFilterFromValues([]), wait);

            await loop.run(controller.signal);

            expect(intervals).toEqual([3000, 3000]);
            expect(ops()).toEqual(["start", "stop", "start", "stop"]);
            expect(loop.state).toBe(LoopState.Stopped);
            expect(lifecycle.running).toBe(false);
        });

        it("finishes the current tick when cancelled during it", async () => {
            const controller = new AbortController();
            let waits = 0;
            const wait: WaitFunction = async (): Promise<boolean> => {
                ++waits;
                if (waits === 1) {
                    enumerator.current = [interfaceEntry("eth0", "10.0.0.6"), loopback];
                    advertiser.beforeStart = async (): Promise<void> => {
                        advertiser.beforeStart = undefined;
                        controller.abort();
                    };
                    return true;
                }
                return false;
            };
            const loop = createLoop(interfaceFilterFromValues([]), wait);

            await loop.run(controller.signal);

            expect(waits).toBe(1);
            expect(advertiser.calls).toEqual([
                { op: "start", hostname: "box.local", addresses: [] },
                { op: "stop", hostname: "box.local" },
                { op: "start", hostname: "box.local", addresses: [] },
                { op: "stop", hostname: "box.local" }
            ]);
            expect(console.log).toHaveBeenCalledWith("mdns responder restarted");
            expect(advertiser.live.size).toBe(0);
            expect(loop.state).toBe(LoopState.Stopped);
        });

        it("shuts down without waiting when cancelled during startup", async () => {
            const controller = new AbortController();
            controller.abort();
            const wait = vi.fn<WaitFunction>();
            const loop = createLoop(interfaceFilterFromValues([]), wait);

            await loop.run(controller.signal);

            expect(wait).not.toHaveBeenCalled();
            expect(ops()).toEqual(["start", "stop"]);
            expect(loop.state).toBe(LoopState.Stopped);
        });
    });
});
