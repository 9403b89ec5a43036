import { compareAddresses } from "./compareAddresses";
import type { InterfaceSnapshotEntry } from "./InterfaceSnapshotEntry";

export function compareSnapshotEntries(a: InterfaceSnapshotEntry, b: InterfaceSnapshotEntry): number {
    if (a.name !== b.name) {
        return a.name < b.name ? -1 : 1;
    }
    const byAddress = compareAddresses(a.address, b.address);
    if (byAddress !== 0) {
        return byAddress;
    }
    if (a.index === b.index) {
        return 0;
    }
    if (a.index === undefined) {
        return -1;
    }
    if (b.index === undefined) {
        return 1;
    }
    return a.index - b.index;
}
