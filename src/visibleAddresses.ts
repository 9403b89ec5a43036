import { compareAddresses } from "./compareAddresses";
import type { InterfaceSnapshot } from "./InterfaceSnapshot";
import type { InterfaceSnapshotEntry } from "./InterfaceSnapshotEntry";

export function visibleAddresses(snapshot: InterfaceSnapshot): string[] {
    const unique = new Set(snapshot.map((entry: InterfaceSnapshotEntry) => entry.address));
    return Array.from(unique).sort(compareAddresses);
}
