import { InterfaceEnumerationError } from "./InterfaceEnumerationError";
import type { InterfaceEnumerator } from "./InterfaceEnumerator";
import type { NetworkInterfaceEntry } from "./NetworkInterfaceEntry";

export function runEnumerator(enumerate: InterfaceEnumerator): NetworkInterfaceEntry[] {
    try {
        return enumerate();
    } catch (err) {
        if (err instanceof InterfaceEnumerationError) {
            throw err;
        }
        throw new InterfaceEnumerationError(`failed to list network interfaces: ${err}`, { cause: err });
    }
}
