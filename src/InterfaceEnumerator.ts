import type { NetworkInterfaceEntry } from "./NetworkInterfaceEntry";

/**
 * Lists every interface address on the host, loopback included. Called at
 * least once per poll interval, so it has to be cheap. Throws on failure.
 */
export type InterfaceEnumerator = () => NetworkInterfaceEntry[];
