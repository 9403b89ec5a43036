export interface AdvertisementHandle {
    readonly hostname: string;
    readonly addresses: readonly string[];
}
