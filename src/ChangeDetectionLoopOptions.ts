import type { InterfaceEnumerator } from "./InterfaceEnumerator";
import type { InterfaceFilter } from "./InterfaceFilter";
import type { ServiceLifecycleManager } from "./ServiceLifecycleManager";
import type { WaitFunction } from "./WaitFunction";

export interface ChangeDetectionLoopOptions {
    name: string;
    filter: InterfaceFilter;
    enumerate: InterfaceEnumerator;
    lifecycle: ServiceLifecycleManager;
    pollIntervalMs: number;
    wait?: WaitFunction;
}
