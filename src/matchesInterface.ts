import type { InterfaceFilter } from "./InterfaceFilter";

export function matchesInterface(filter: InterfaceFilter, interfaceName: string): boolean {
    return filter.kind === "all" || filter.names.has(interfaceName);
}
