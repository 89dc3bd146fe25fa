import type { URLClassification } from '@/interception/types';

const parseURL = (url: string | undefined): URL | undefined => {
    if (!url) {
        return undefined;
    }
    try {
        return new URL(url);
    } catch {
        return undefined;
    }
};

const normalizeHost = (host: string) => host.trim().toLowerCase().replace(/\.+$/, '');

/**
 * Matches URLs whose host is one of the given hosts or a subdomain of one.
 * URLs that cannot be parsed, or have no host, never match.
 */
export class FirstPartyURLsFilter {
    private readonly hosts: ReadonlySet<string>;

    constructor(hosts: Iterable<string>) {
        const normalized = new Set<string>();
        for (const host of hosts) {
            const value = normalizeHost(host);
            if (value.length > 0) {
                normalized.add(value);
            }
        }
        this.hosts = normalized;
    }

    get isEmpty(): boolean {
        return this.hosts.size === 0;
    }

    isFirstParty(url: string | undefined): boolean {
        const hostname = parseURL(url)?.hostname;
        if (!hostname) {
            return false;
        }
        const host = normalizeHost(hostname);
        for (const candidate of this.hosts) {
            if (host === candidate || host.endsWith(`.${candidate}`)) {
                return true;
            }
        }
        return false;
    }
}

/**
 * Matches requests sent to the SDK's own intake endpoints.
 * A request is internal when its normalized URL starts with one of the configured URLs.
 */
export class InternalURLsFilter {
    private readonly prefixes: readonly string[];

    constructor(urls: Iterable<string>) {
        const prefixes: string[] = [];
        for (const url of urls) {
            const parsed = parseURL(url.trim());
            if (parsed) {
                prefixes.push(parsed.href);
            }
        }
        this.prefixes = prefixes;
    }

    isInternal(url: string | undefined): boolean {
        const href = parseURL(url)?.href;
        if (!href) {
            return false;
        }
        return this.prefixes.some((prefix) => href.startsWith(prefix));
    }
}

export type URLFilters = {
    internal: InternalURLsFilter;
    firstParty: readonly FirstPartyURLsFilter[];
};

/** Internal wins over first-party; anything unrecognized is third-party. */
export const classifyURL = (url: string | undefined, filters: URLFilters): URLClassification => {
    if (filters.internal.isInternal(url)) {
        return 'internal';
    }
    if (filters.firstParty.some((filter) => filter.isFirstParty(url))) {
        return 'first-party';
    }
    return 'third-party';
};
