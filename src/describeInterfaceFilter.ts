import type { InterfaceFilter } from "./InterfaceFilter";

export function describeInterfaceFilter(filter: InterfaceFilter): string {
    if (filter.kind === "all") {
        return "*";
    }
    return Array.from(filter.names).sort().join(",");
}
