import { describe, expect, it } from 'vitest';
import { classifyURL, FirstPartyURLsFilter, InternalURLsFilter } from '@/interception/url-filters';

describe('url-filters', () => {
    describe('FirstPartyURLsFilter', () => {
        const filter = new FirstPartyURLsFilter(['example.com', 'API.Test.']);

        it('matches the host and its subdomains', () => {
            expect(filter.isFirstParty('https://example.com/path')).toBe(true);
            expect(filter.isFirstParty('https://cdn.eu.example.com/a.png')).toBe(true);
            expect(filter.isFirstParty('http://api.test:8080/')).toBe(true);
        });

        it('ignores case and trailing dots', () => {
            expect(filter.isFirstParty('https://WWW.Example.COM./')).toBe(true);
        });

        it('does not match lookalike hosts', () => {
            expect(filter.isFirstParty('https://notexample.com/')).toBe(false);
            expect(filter.isFirstParty('https://example.com.attacker.org/')).toBe(false);
            expect(filter.isFirstParty('https://other.org/example.com')).toBe(false);
        });

        it('never matches URLs without a host', () => {
            expect(filter.isFirstParty('not a url')).toBe(false);
            expect(filter.isFirstParty('data:text/plain,example.com')).toBe(false);
            expect(filter.isFirstParty(undefined)).toBe(false);
        });

        it('reports when it has no hosts', () => {
            expect(new FirstPartyURLsFilter(['', '  ']).isEmpty).toBe(true);
            expect(filter.isEmpty).toBe(false);
        });
    });

    describe('InternalURLsFilter', () => {
        const filter = new InternalURLsFilter(['https://Intake.Example.net/api/', 'https://logs.example.net']);

        it('matches URLs under a configured prefix', () => {
            expect(filter.isInternal('https://intake.example.net/api/v2/rum?batch=1')).toBe(true);
            expect(filter.isInternal('https://logs.example.net/v1/input')).toBe(true);
        });

        it('does not match outside the prefix', () => {
            expect(filter.isInternal('https://intake.example.net/other')).toBe(false);
            expect(filter.isInternal('https://logs.example.net.evil.org/')).toBe(false);
            expect(filter.isInternal('not a url')).toBe(false);
        });
    });

    describe('classifyURL', () => {
        const filters = {
            internal: new InternalURLsFilter(['https://intake.example.com/']),
            firstParty: [new FirstPartyURLsFilter(['example.com']), new FirstPartyURLsFilter(['partner.org'])],
        };

        it('prefers internal over first-party', () => {
            expect(classifyURL('https://intake.example.com/v1', filters)).toBe('internal');
        });

        it('checks every first-party filter', () => {
            expect(classifyURL('https://api.example.com/', filters)).toBe('first-party');
            expect(classifyURL('https://partner.org/', filters)).toBe('first-party');
        });

        it('falls back to third-party', () => {
            expect(classifyURL('https://cdn.other.io/lib.js', filters)).toBe('third-party');
            expect(classifyURL('::', filters)).toBe('third-party');
        });
    });
});
