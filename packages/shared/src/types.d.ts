export type ErrorShape = {
    error: {
        code: string;
        reason: string;
        meta: Record<string, unknown>;
    };
};
export type JwtClaims = {
    sub: string;
};
export type WatcherState = "idle" | "authenticating" | "subscribing" | "streaming" | "draining" | "stopped" | "failed";
export type WatcherCounters = {
    received: number;
    processed: number;
    skipped: number;
    notified: number;
};
export type WatcherStatus = {
    state: WatcherState;
    cursor: string;
    updatedAtUtc: string;
    counters: WatcherCounters;
};
export type DeviceOptIn = {
    actorAccount: string;
    deviceToken: string;
    updatedAtUtc: string;
};
