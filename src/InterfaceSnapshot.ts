import type { InterfaceSnapshotEntry } from "./InterfaceSnapshotEntry";

/**
 * Sorted and deduplicated view of the relevant non-loopback interfaces. Built
 * fresh on every poll and never modified afterwards.
 */
export type InterfaceSnapshot = readonly InterfaceSnapshotEntry[];
