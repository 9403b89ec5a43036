import type { InterfaceSnapshot } from "./InterfaceSnapshot";
import type { InterfaceSnapshotEntry } from "./InterfaceSnapshotEntry";

export function formatSnapshot(snapshot: InterfaceSnapshot): string {
    const entries = snapshot.map((entry: InterfaceSnapshotEntry) =>
        entry.index === undefined ? `${entry.name}=${entry.address}` : `${entry.name}=${entry.address}#${entry.index}`
    );
    return `[${entries.join(", ")}]`;
}
