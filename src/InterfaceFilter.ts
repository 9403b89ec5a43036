/**
 * Which network interfaces the responder cares about. `all` covers every
 * non-loopback interface; `only` is an exact, case-sensitive set of names.
 */
export type InterfaceFilter = { kind: "all" } | { kind: "only"; names: ReadonlySet<string> };
