import type { InterfaceEnumerator } from "./InterfaceEnumerator";

export interface HostnameResponderOptions {
    // Used to find the host's addresses when the responder is unrestricted
    enumerate: InterfaceEnumerator;
    // Seconds
    ttl: number;
}
