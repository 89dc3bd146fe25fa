/** Milliseconds since the Unix epoch. */
export type TimeInterval = {
    readonly startMs: number;
    readonly endMs: number;
};

export type ResourceFetchType = 'network-load' | 'server-push' | 'local-cache' | 'unknown';

/** Timing for one request/response exchange of a task; a redirected task has several. */
export type TransactionMetrics = {
    readonly resourceFetchType: ResourceFetchType;
    readonly fetchStartMs?: number;
    readonly domainLookupStartMs?: number;
    readonly domainLookupEndMs?: number;
    readonly connectStartMs?: number;
    readonly connectEndMs?: number;
    readonly secureConnectionStartMs?: number;
    readonly secureConnectionEndMs?: number;
    readonly requestStartMs?: number;
    readonly responseStartMs?: number;
    readonly responseEndMs?: number;
    readonly countOfResponseBodyBytesAfterDecoding?: number;
};

/** Raw metrics as delivered by the transport. */
export type TaskMetrics = {
    readonly taskInterval: TimeInterval;
    readonly redirectCount: number;
    readonly transactionMetrics: readonly TransactionMetrics[];
};

/**
 * Timing phases reported for a resource. Only `fetch` is always known.
 * `redirectCount` is present for redirected tasks even when no redirect timing was measured.
 */
export type ResourceMetrics = {
    readonly fetch: TimeInterval;
    readonly redirectCount?: number;
    readonly redirection?: TimeInterval;
    readonly dns?: TimeInterval;
    readonly connect?: TimeInterval;
    readonly ssl?: TimeInterval;
    readonly firstByte?: TimeInterval;
    readonly download?: TimeInterval;
    readonly responseSize?: number;
};

const interval = (startMs: number | undefined, endMs: number | undefined): TimeInterval | undefined =>
    startMs !== undefined && endMs !== undefined ? { startMs, endMs } : undefined;

/**
 * Local-cache loads are ignored. The last remaining transaction describes the final
 * response; any transactions before it were redirects. Redirection is only reported
 * when the task itself counted redirects.
 */
export const resourceMetricsFromTaskMetrics = (taskMetrics: TaskMetrics): ResourceMetrics => {
    const transactions = taskMetrics.transactionMetrics.filter(
        (transaction) => transaction.resourceFetchType !== 'local-cache',
    );
    const fetch: TimeInterval = { ...taskMetrics.taskInterval };
    const redirectCount = taskMetrics.redirectCount > 0 ? taskMetrics.redirectCount : undefined;
    const last = transactions.at(-1);
    if (!last) {
        return redirectCount === undefined ? { fetch } : { fetch, redirectCount };
    }

    const redirects = redirectCount === undefined ? [] : transactions.slice(0, -1);
    return {
        fetch,
        redirectCount,
        redirection: interval(redirects[0]?.fetchStartMs, redirects.at(-1)?.responseEndMs),
        dns: interval(last.domainLookupStartMs, last.domainLookupEndMs),
        connect: interval(last.connectStartMs, last.connectEndMs),
        ssl: interval(last.secureConnectionStartMs, last.secureConnectionEndMs),
        firstByte: interval(last.requestStartMs, last.responseStartMs),
        download: interval(last.responseStartMs, last.responseEndMs),
        responseSize: last.countOfResponseBodyBytesAfterDecoding,
    };
};
