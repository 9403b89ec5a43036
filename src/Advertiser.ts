import type { AdvertisementHandle } from "./AdvertisementHandle";

/**
 * Announces a hostname on the local network. An empty `restrictionAddresses`
 * means the name may resolve to any address of the host, not to none.
 */
export interface Advertiser {
    start(hostname: string, restrictionAddresses: readonly string[]): Promise<AdvertisementHandle>;
    stop(handle: AdvertisementHandle): Promise<void>;
}
