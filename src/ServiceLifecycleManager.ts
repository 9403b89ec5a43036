import { AdvertisementError } from "./AdvertisementError";
import { canonicalHostname } from "./canonicalHostname";
import { debug } from "./debug";
import { describeInterfaceFilter } from "./describeInterfaceFilter";
import { error } from "./error";
import { log } from "./log";
import { selectedAddresses } from "./selectedAddresses";
import { visibleAddresses } from "./visibleAddresses";
import type { AdvertisementHandle } from "./AdvertisementHandle";
import type { Advertiser } from "./Advertiser";
import type { InterfaceFilter } from "./InterfaceFilter";
import type { InterfaceSnapshot } from "./InterfaceSnapshot";

/**
 * Owns the single live advertisement. A new one is only started once the
 * previous handle has been released, so two responders never answer for the
 * same name at the same time.
 */
export class ServiceLifecycleManager {
    #advertiser: Advertiser;
    #handle: AdvertisementHandle | undefined;
    #shutdown: Promise<void> | undefined;

    constructor(advertiser: Advertiser) {
        this.#advertiser = advertiser;
    }

    get handle(): AdvertisementHandle | undefined {
        return this.#handle;
    }

    get running(): boolean {
        return this.#handle !== undefined;
    }

    async start(name: string, filter: InterfaceFilter, snapshot: InterfaceSnapshot): Promise<AdvertisementHandle> {
        if (this.#shutdown) {
            throw new AdvertisementError("mdns responder lifecycle is shut down");
        }
        if (this.#handle) {
            throw new AdvertisementError(`responder for ${this.#handle.hostname} is still running`);
        }

        const hostname = canonicalHostname(name);
        const allowed = selectedAddresses(filter, snapshot);
        log(
            `starting mdns responder: hostname=${hostname}, interfaces=${describeInterfaceFilter(filter)}, visible_ips=[${visibleAddresses(snapshot).join(", ")}]`
        );
        debug(`responder allowed_ips=[${allowed.join(", ")}]`);

        let handle: AdvertisementHandle;
        try {
            handle = await this.#advertiser.start(hostname, allowed);
        } catch (err) {
            if (err instanceof AdvertisementError) {
                throw err;
            }
            throw new AdvertisementError(`failed to start mdns responder for ${hostname}: ${err}`, { cause: err });
        }
        // shutdown() ran while the advertiser was starting
        if (this.#shutdown) {
            await this.stop(handle);
            throw new AdvertisementError(`mdns responder for ${hostname} started after shutdown`);
        }
        this.#handle = handle;
        return handle;
    }

    async stop(handle: AdvertisementHandle): Promise<void> {
        if (this.#handle === handle) {
            this.#handle = undefined;
        }
        try {
            await this.#advertiser.stop(handle);
        } catch (err) {
            error(`failed to stop mdns responder for ${handle.hostname}:`, err);
        }
    }

    async ensureRunning(
        name: string,
        filter: InterfaceFilter,
        snapshot: InterfaceSnapshot
    ): Promise<AdvertisementHandle> {
        if (this.#handle) {
            await this.stop(this.#handle);
        }
        return this.start(name, filter, snapshot);
    }

    shutdown(): Promise<void> {
        if (!this.#shutdown) {
            this.#shutdown = this.#releaseHandle();
        }
        return this.#shutdown;
    }

    async #releaseHandle(): Promise<void> {
        const handle = this.#handle;
        if (handle) {
            debug(`stopping mdns responder for ${handle.hostname}`);
            await this.stop(handle);
        }
    }
}
