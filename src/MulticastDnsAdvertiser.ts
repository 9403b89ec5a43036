import { AdvertisementError } from "./AdvertisementError";
import { HostnameResponder } from "./HostnameResponder";
import { debug } from "./debug";
import { enumerateInterfaces } from "./enumerateInterfaces";
import type { AdvertisementHandle } from "./AdvertisementHandle";
import type { Advertiser } from "./Advertiser";
import type { InterfaceEnumerator } from "./InterfaceEnumerator";

const DEFAULT_TTL = 120;

export class MulticastDnsAdvertiser implements Advertiser {
    #enumerate: InterfaceEnumerator;
    #ttl: number;
    #responders = new Map<AdvertisementHandle, HostnameResponder>();

    constructor(options: { enumerate?: InterfaceEnumerator; ttl?: number } = {}) {
        this.#enumerate = options.enumerate ?? enumerateInterfaces;
        this.#ttl = options.ttl ?? DEFAULT_TTL;
    }

    get activeCount(): number {
        return this.#responders.size;
    }

    async start(hostname: string, restrictionAddresses: readonly string[]): Promise<AdvertisementHandle> {
        const responder = new HostnameResponder(hostname, [...restrictionAddresses], {
            enumerate: this.#enumerate,
            ttl: this.#ttl
        });

        try {
            await responder.start();
        } catch (err) {
            throw new AdvertisementError(`failed to start mdns responder for ${hostname}: ${err}`, { cause: err });
        }

        this.#responders.set(responder, responder);
        return responder;
    }

    async stop(handle: AdvertisementHandle): Promise<void> {
        const responder = this.#responders.get(handle);
        if (!responder) {
            debug(`mdns responder for ${handle.hostname} is not running`);
            return;
        }
        this.#responders.delete(handle);
        await responder.stop();
    }
}
