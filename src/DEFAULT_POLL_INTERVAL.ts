// Seconds between interface polls
export const DEFAULT_POLL_INTERVAL = 3;
