import type { InterfaceFilter } from "./InterfaceFilter";

// Accepts repeated and comma-joined values, e.g. ["eth0,wlan0", " eth1 "]
export function interfaceFilterFromValues(values: readonly string[]): InterfaceFilter {
    const selected = new Set<string>();
    for (const value of values) {
        for (const item of value.split(",")) {
            const name = item.trim();
            if (!name) {
                continue;
            }
            if (name === "*") {
                return { kind: "all" };
            }
            selected.add(name);
        }
    }

    if (selected.size === 0) {
        return { kind: "all" };
    }
    return { kind: "only", names: selected };
}
