import { describe, it, expect, vi, beforeEach } from 'vitest';
import { readFileSync } from 'fs';
import { fetchApiKey, parseApiKey, resolveApiKey } from '../credentials';
import { CredentialError } from '../errors';
import { createClient } from '../http';

const HOME_PAGE = readFileSync(new URL('./fixtures/home.html', import.meta.url), 'utf8');

describe('parseApiKey', () => {
    it('finds the key embedded in the home page', () => {
        expect(parseApiKey(HOME_PAGE)).toBe('0123456789abcdef0123456789abcdef');
    });

    it('returns null when no key is present', () => {
        expect(parseApiKey('whatever')).toBeNull();
        expect(parseApiKey('apiKey=')).toBeNull();
    });
});

describe('fetchApiKey', () => {
    let fetchMock: ReturnType<typeof vi.fn>;

    beforeEach(() => {
        fetchMock = vi.fn();
        vi.stubGlobal('fetch', fetchMock);
    });

    it('reads the key from the credential page', async () => {
        fetchMock.mockResolvedValue(new Response(HOME_PAGE, { status: 200 }));

        const key = await fetchApiKey(createClient({ timeoutMs: 1_000 }));

        expect(key).toBe('0123456789abcdef0123456789abcdef');
        expect(fetchMock).toHaveBeenCalledTimes(1);
        expect(fetchMock.mock.calls[0][0]).toBe('https://www.wunderground.com');
    });

    it('honours a custom credential url', async () => {
        fetchMock.mockResolvedValue(new Response('<a href="/x?apiKey=abc123">', { status: 200 }));

        const key = await fetchApiKey(createClient(), { url: 'https://credentials.test/page' });

        expect(key).toBe('abc123');
        expect(fetchMock.mock.calls[0][0]).toBe('https://credentials.test/page');
    });

    it('falls back to response headers', async () => {
        fetchMock.mockResolvedValue(
            new Response('<html></html>', { status: 200, headers: { 'x-widget-config': 'apiKey=feedbeef42' } })
        );

        await expect(fetchApiKey(createClient())).resolves.toBe('feedbeef42');
    });

    it('fails when the page carries no key', async () => {
        fetchMock.mockResolvedValue(new Response('<html></html>', { status: 200 }));

        const failure = fetchApiKey(createClient());

        await expect(failure).rejects.toBeInstanceOf(CredentialError);
        await expect(failure).rejects.toThrow('no api key found in https://www.wunderground.com');
    });

    it('fails on a non-success status', async () => {
        fetchMock.mockResolvedValue(new Response('nope', { status: 503, statusText: 'Service Unavailable' }));

        await expect(fetchApiKey(createClient())).rejects.toThrow(
            'https://www.wunderground.com answered 503 Service Unavailable'
        );
    });

    it('wraps network failures', async () => {
        const cause = new Error('getaddrinfo ENOTFOUND www.wunderground.com');
        fetchMock.mockRejectedValue(cause);

        const failure = fetchApiKey(createClient());

        await expect(failure).rejects.toMatchObject({ kind: 'credential' });
        await expect(failure).rejects.toThrow(
            'unable to load https://www.wunderground.com: GET https://www.wunderground.com/ failed: getaddrinfo ENOTFOUND www.wunderground.com'
        );
    });
});

describe('resolveApiKey', () => {
    it('prefers a configured key without any request', async () => {
        const fetchMock = vi.fn();
        vi.stubGlobal('fetch', fetchMock);

        await expect(resolveApiKey(createClient(), ' test-key ')).resolves.toBe('test-key');
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('fetches when the configured key is blank', async () => {
        vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response(HOME_PAGE, { status: 200 })));

        await expect(resolveApiKey(createClient(), '')).resolves.toBe('0123456789abcdef0123456789abcdef');
    });
});
