const DOMAIN_SUFFIX = ".local";

export function canonicalHostname(name: string): string {
    return name.endsWith(DOMAIN_SUFFIX) ? name : `${name}${DOMAIN_SUFFIX}`;
}
