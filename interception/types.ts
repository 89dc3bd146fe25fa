export type HttpHeaders = Readonly<Record<string, string>>;

/** An outgoing request as seen by the interceptor. Treated as immutable. */
export type HttpRequest = {
    readonly method: string;
    readonly url: string;
    readonly headers: HttpHeaders;
    readonly body?: string;
};

export type HttpResponse = {
    readonly statusCode: number;
    readonly headers: HttpHeaders;
};

/**
 * A request in flight on some transport. The task object itself is the correlation key,
 * so the transport must pass the same object to every lifecycle call.
 */
export interface NetworkTask {
    readonly originalRequest?: HttpRequest;
    /** Set by the transport once the response head is known, before completion is reported. */
    response?: HttpResponse;
}

/** Per-session capability: hosts treated as first-party in addition to the configured ones. */
export interface TransportSession {
    readonly additionalFirstPartyHosts?: Iterable<string>;
}

export type URLClassification = 'internal' | 'first-party' | 'third-party';
