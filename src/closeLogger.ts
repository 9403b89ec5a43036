import { detachLogStream } from "./configureLogger";

export function closeLogger(): Promise<void> {
    const stream = detachLogStream();
    if (!stream) {
        return Promise.resolve();
    }
    return new Promise<void>((resolve: () => void) => {
        stream.end(resolve);
    });
}
