import { isIPv4, isIPv6 } from "net";

function ipv4Bytes(address: string): number[] {
    return address.split(".").map((octet: string) => parseInt(octet, 10));
}

function groupValues(part: string): number[] {
    return part
        .split(":")
        .filter((group: string) => group.length > 0)
        .map((group: string) => parseInt(group, 16));
}

/**
 * Network-order bytes of an address: 4 for IPv4, 16 for IPv6, empty when the
 * text is not an address. A zone suffix ("%eth0") is ignored.
 */
export function addressBytes(address: string): number[] {
    const [unscoped = ""] = address.split("%");
    if (isIPv4(unscoped)) {
        return ipv4Bytes(unscoped);
    }
    if (!isIPv6(unscoped)) {
        return [];
    }

    let text = unscoped;
    const lastColon = text.lastIndexOf(":");
    const tail = text.slice(lastColon + 1);
    if (isIPv4(tail)) {
        // ::ffff:10.0.0.1 style, rewrite the dotted quad as two groups
        const [a = 0, b = 0, c = 0, d = 0] = ipv4Bytes(tail);
        text = `${text.slice(0, lastColon + 1)}${((a << 8) | b).toString(16)}:${((c << 8) | d).toString(16)}`;
    }

    const [headPart = "", restPart] = text.split("::");
    const head = groupValues(headPart);
    const rest = restPart === undefined ? [] : groupValues(restPart);
    const zeros = new Array<number>(8 - head.length - rest.length).fill(0);
    const groups = [...head, ...zeros, ...rest];

    return groups.flatMap((group: number) => [group >> 8, group & 0xff]);
}
