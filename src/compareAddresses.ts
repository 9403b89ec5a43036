import { addressBytes } from "./addressBytes";

// IPv4 sorts before IPv6, then numerically
export function compareAddresses(a: string, b: string): number {
    const left = addressBytes(a);
    const right = addressBytes(b);
    if (left.length !== right.length) {
        return left.length - right.length;
    }
    for (let i = 0; i < left.length; ++i) {
        const diff = (left[i] ?? 0) - (right[i] ?? 0);
        if (diff !== 0) {
            return diff;
        }
    }
    if (a === b) {
        return 0;
    }
    return a < b ? -1 : 1;
}
