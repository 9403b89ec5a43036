export interface InterfaceSnapshotEntry {
    readonly name: string;
    readonly address: string;
    readonly index?: number;
}
