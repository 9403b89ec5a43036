import { debug } from "./debug";
import { error } from "./error";
import { isIPv4 } from "net";
import { isLoopback } from "./isLoopback";
import { verbose } from "./verbose";
import mdns from "multicast-dns";
import type { AdvertisementHandle } from "./AdvertisementHandle";
import type { Answer, Question } from "dns-packet";
import type { HostnameResponderOptions } from "./HostnameResponderOptions";
import type { InterfaceEnumerator } from "./InterfaceEnumerator";
import type { NetworkInterfaceEntry } from "./NetworkInterfaceEntry";

type MulticastDns = ReturnType<typeof mdns>;

/**
 * Answers A and AAAA questions for a single `.local` hostname. With an empty
 * address list it answers with every non-loopback address the host has at the
 * time of the question.
 */
export class HostnameResponder implements AdvertisementHandle {
    readonly hostname: string;
    readonly addresses: readonly string[];
    #enumerate: InterfaceEnumerator;
    #ttl: number;
    #mdns: MulticastDns | undefined;
    #stopped: boolean = false;

    constructor(hostname: string, addresses: readonly string[], options: HostnameResponderOptions) {
        this.hostname = hostname;
        this.addresses = addresses;
        this.#enumerate = options.enumerate;
        this.#ttl = options.ttl;
    }

    get active(): boolean {
        return this.#mdns !== undefined && !this.#stopped;
    }

    async start(): Promise<void> {
        if (this.#mdns) {
            return;
        }

        const responder = mdns({ reuseAddr: true });
        try {
            await new Promise<void>((resolve: () => void, reject: (err: Error) => void) => {
                const onError = (err: Error): void => {
                    responder.removeListener("ready", onReady);
                    reject(err);
                };
                const onReady = (): void => {
                    responder.removeListener("error", onError);
                    resolve();
                };
                responder.once("ready", onReady);
                responder.once("error", onError);
            });
        } catch (err) {
            responder.destroy();
            throw err;
        }

        responder.on("query", (query: { questions: Question[] }) => {
            this.#onQuery(query.questions);
        });
        responder.on("error", (err: Error) => {
            error(`mdns responder error for ${this.hostname}:`, err);
        });
        this.#mdns = responder;

        const answers = this.answersFor([{ name: this.hostname, type: "ANY" }]);
        if (answers.length > 0) {
            debug(`announcing ${this.hostname} with ${answers.length} record(s)`);
            try {
                await this.#respond(responder, answers);
            } catch (err) {
                error(`failed to announce ${this.hostname}:`, err);
            }
        }
    }

    async stop(): Promise<void> {
        const responder = this.#mdns;
        if (!responder || this.#stopped) {
            return;
        }
        this.#stopped = true;

        // Goodbye packets: the same records with a zero TTL
        const goodbye = this.#records(0);
        if (goodbye.length > 0) {
            try {
                await this.#respond(responder, goodbye);
            } catch (err) {
                debug(`failed to send goodbye for ${this.hostname}:`, err);
            }
        }

        await new Promise<void>((resolve: () => void) => {
            responder.destroy(resolve);
        });
    }

    answersFor(questions: readonly Question[]): Answer[] {
        const wanted = new Set<string>();
        for (const question of questions) {
            if (question.name.toLowerCase() !== this.hostname.toLowerCase()) {
                continue;
            }
            if (question.type === "A" || question.type === "ANY") {
                wanted.add("A");
            }
            if (question.type === "AAAA" || question.type === "ANY") {
                wanted.add("AAAA");
            }
        }
        if (wanted.size === 0) {
            return [];
        }
        return this.#records(this.#ttl).filter((answer: Answer) => wanted.has(answer.type));
    }

    #onQuery(questions: Question[]): void {
        const responder = this.#mdns;
        if (!responder || this.#stopped) {
            return;
        }
        const answers = this.answersFor(questions);
        if (answers.length === 0) {
            return;
        }
        verbose(`answering query for ${this.hostname} with ${answers.length} record(s)`);
        this.#respond(responder, answers).catch((err: unknown) => {
            error(`failed to answer query for ${this.hostname}:`, err);
        });
    }

    #records(ttl: number): Answer[] {
        return this.#currentAddresses().map(
            (address: string): Answer => ({
                name: this.hostname,
                type: isIPv4(address) ? "A" : "AAAA",
                ttl,
                class: "IN",
                flush: true,
                data: address
            })
        );
    }

    #currentAddresses(): string[] {
        if (this.addresses.length > 0) {
            return [...this.addresses];
        }

        let interfaces: NetworkInterfaceEntry[];
        try {
            interfaces = this.#enumerate();
        } catch (err) {
            debug(`failed to list addresses for ${this.hostname}:`, err);
            return [];
        }
        const addresses = interfaces
            .filter((iface: NetworkInterfaceEntry) => !isLoopback(iface))
            .map((iface: NetworkInterfaceEntry) => iface.address);
        return Array.from(new Set(addresses));
    }

    #respond(responder: MulticastDns, answers: Answer[]): Promise<void> {
        return new Promise<void>((resolve: () => void, reject: (err: Error) => void) => {
            responder.respond({ answers }, (err: Error | null) => {
                if (err) {
                    reject(err);
                } else {
                    resolve();
                }
            });
        });
    }
}
