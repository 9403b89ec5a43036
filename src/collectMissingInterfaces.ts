import { runEnumerator } from "./runEnumerator";
import type { InterfaceEnumerator } from "./InterfaceEnumerator";
import type { InterfaceFilter } from "./InterfaceFilter";
import type { NetworkInterfaceEntry } from "./NetworkInterfaceEntry";

/**
 * Requested interface names the host does not have at all. Nothing can be
 * missing from a wildcard filter.
 */
export function collectMissingInterfaces(filter: InterfaceFilter, enumerate: InterfaceEnumerator): string[] {
    if (filter.kind === "all") {
        return [];
    }

    const existing = new Set(runEnumerator(enumerate).map((iface: NetworkInterfaceEntry) => iface.name));
    return Array.from(filter.names)
        .filter((name: string) => !existing.has(name))
        .sort();
}
