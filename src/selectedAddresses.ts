import { visibleAddresses } from "./visibleAddresses";
import type { InterfaceFilter } from "./InterfaceFilter";
import type { InterfaceSnapshot } from "./InterfaceSnapshot";

/**
 * Addresses the responder is restricted to. An empty list means "no
 * restriction", which is what the wildcard filter asks for.
 */
export function selectedAddresses(filter: InterfaceFilter, snapshot: InterfaceSnapshot): string[] {
    if (filter.kind === "all") {
        return [];
    }
    return visibleAddresses(snapshot);
}
