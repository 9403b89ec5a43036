import { compareSnapshotEntries } from "./compareSnapshotEntries";
import { isLoopback } from "./isLoopback";
import { matchesInterface } from "./matchesInterface";
import { runEnumerator } from "./runEnumerator";
import type { InterfaceEnumerator } from "./InterfaceEnumerator";
import type { InterfaceFilter } from "./InterfaceFilter";
import type { InterfaceSnapshot } from "./InterfaceSnapshot";
import type { InterfaceSnapshotEntry } from "./InterfaceSnapshotEntry";

export function collectSnapshot(filter: InterfaceFilter, enumerate: InterfaceEnumerator): InterfaceSnapshot {
    const entries: InterfaceSnapshotEntry[] = [];
    for (const iface of runEnumerator(enumerate)) {
        if (isLoopback(iface) || !matchesInterface(filter, iface.name)) {
            continue;
        }
        entries.push(
            iface.index === undefined
                ? { name: iface.name, address: iface.address }
                : { name: iface.name, address: iface.address, index: iface.index }
        );
    }

    entries.sort(compareSnapshotEntries);
    return entries.filter(
        (entry: InterfaceSnapshotEntry, idx: number) =>
            idx === 0 || compareSnapshotEntries(entries[idx - 1] ?? entry, entry) !== 0
    );
}
