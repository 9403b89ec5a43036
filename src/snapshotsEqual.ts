import { compareSnapshotEntries } from "./compareSnapshotEntries";
import type { InterfaceSnapshot } from "./InterfaceSnapshot";
import type { InterfaceSnapshotEntry } from "./InterfaceSnapshotEntry";

export function snapshotsEqual(a: InterfaceSnapshot, b: InterfaceSnapshot): boolean {
    if (a.length !== b.length) {
        return false;
    }
    return a.every((entry: InterfaceSnapshotEntry, idx: number) => {
        const other = b[idx];
        return other !== undefined && compareSnapshotEntries(entry, other) === 0;
    });
}
