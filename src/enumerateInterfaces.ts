import { InterfaceEnumerationError } from "./InterfaceEnumerationError";
import { networkInterfaces } from "os";
import type { NetworkInterfaceEntry } from "./NetworkInterfaceEntry";

export function enumerateInterfaces(): NetworkInterfaceEntry[] {
    let interfaces: ReturnType<typeof networkInterfaces>;
    try {
        interfaces = networkInterfaces();
    } catch (err) {
        throw new InterfaceEnumerationError(`failed to list network interfaces: ${err}`, { cause: err });
    }

    const result: NetworkInterfaceEntry[] = [];
    for (const [name, infos] of Object.entries(interfaces)) {
        for (const info of infos ?? []) {
            const entry: NetworkInterfaceEntry = {
                name,
                address: info.address,
                family: info.family === "IPv4" ? "IPv4" : "IPv6",
                internal: info.internal
            };
            // Node only exposes the interface index as the scope id of IPv6 addresses
            if (info.family === "IPv6" && info.scopeid) {
                entry.index = info.scopeid;
            }
            result.push(entry);
        }
    }
    return result;
}
