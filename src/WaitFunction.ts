// Resolves true once `ms` elapsed, false as soon as the signal is aborted
export type WaitFunction = (ms: number, signal: AbortSignal) => Promise<boolean>;
