// One address of one interface, as reported by the operating system
export interface NetworkInterfaceEntry {
    name: string;
    address: string;
    family: "IPv4" | "IPv6";
    internal: boolean;
    index?: number;
}
