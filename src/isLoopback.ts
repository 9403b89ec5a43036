import { addressBytes } from "./addressBytes";
import type { NetworkInterfaceEntry } from "./NetworkInterfaceEntry";

export function isLoopback(entry: NetworkInterfaceEntry): boolean {
    if (entry.internal) {
        return true;
    }
    const bytes = addressBytes(entry.address);
    if (bytes.length === 4) {
        return bytes[0] === 127;
    }
    if (bytes.length === 16) {
        return bytes.every((byte: number, idx: number) => byte === (idx === 15 ? 1 : 0));
    }
    return false;
}
