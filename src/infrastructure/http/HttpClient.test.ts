import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { Readable } from 'stream';
import nodeFetch, { Response } from 'node-fetch';
import { HttpClient, parseContentLength, parseContentRange } from './HttpClient';
import { HttpStatusError } from '../../shared/errors/AppError';
import { silentLogger } from '../../shared/logging/Logger';

jest.mock('node-fetch', () => {
    const actual = jest.requireActual<typeof import('node-fetch')>('node-fetch');
    return { __esModule: true, ...actual, default: jest.fn() };
});

const mockedFetch = jest.mocked(nodeFetch);

function respond(status: number, statusText: string, headers: Record<string, string> = {}, body = ''): Response {
    return new Response(Readable.from([Buffer.from(body)]), { status, statusText, headers });
}

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        mockedFetch.mockReset();
        client = new HttpClient(silentLogger);
    });

    describe('open', () => {
        it('should issue a plain GET with identification headers', async () => {
            mockedFetch.mockResolvedValueOnce(
                respond(200, 'OK', { 'content-length': '5', 'content-type': 'application/pdf' }, '%PDF-')
            );

            const response = await client.open({ url: 'https://x.test/a.pdf', userAgent: 'test-agent' });

            expect(mockedFetch).toHaveBeenCalledWith('https://x.test/a.pdf', {
                method: 'GET',
                headers: {
                    'User-Agent': 'test-agent',
                    'Accept-Encoding': 'identity',
                    Accept: 'application/pdf,application/octet-stream,*/*'
                },
                redirect: 'follow',
                follow: 10,
                compress: false,
                signal: undefined
            });
            expect(response.status).toBe(200);
            expect(response.contentLength).toBe(5);
            expect(response.contentRange).toBeUndefined();
        });

        it('should request a byte range when resuming', async () => {
            mockedFetch.mockResolvedValueOnce(
                respond(206, 'Partial Content', { 'content-length': '500', 'content-range': 'bytes 500-999/1000' })
            );

            const response = await client.open({ url: 'https://x.test/a.pdf', userAgent: 'test-agent', rangeStart: 500 });

            const init = mockedFetch.mock.calls[0][1];
            expect(init?.headers).toEqual(expect.objectContaining({ Range: 'bytes=500-' }));
            expect(response.status).toBe(206);
            expect(response.contentLength).toBe(500);
            expect(response.contentRange).toEqual({ start: 500, end: 999, total: 1000 });
        });

        it('should not send a range for offset 0', async () => {
            mockedFetch.mockResolvedValueOnce(respond(200, 'OK'));

            await client.open({ url: 'https://x.test/a.pdf', userAgent: 'test-agent', rangeStart: 0 });

            const init = mockedFetch.mock.calls[0][1];
            expect(init?.headers).not.toHaveProperty('Range');
        });

        it('should raise HttpStatusError with Retry-After for non-2xx responses', async () => {
            const errorPage = Readable.from([Buffer.from('busy')]);
            mockedFetch.mockResolvedValueOnce(
                new Response(errorPage, { status: 503, statusText: 'Service Unavailable', headers: { 'retry-after': '7' } })
            );

            const error = await client.open({ url: 'https://x.test/a.pdf', userAgent: 'test-agent' })
                .catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(HttpStatusError);
            expect(error).toMatchObject({ status: 503, retryAfterSeconds: 7, message: 'HTTP 503 Service Unavailable' });
            expect(errorPage.destroyed).toBe(true);
        });

        it('should hand back the response body as a readable stream', async () => {
            const content = Readable.from([Buffer.from('%PDF-')]);
            mockedFetch.mockResolvedValueOnce(new Response(content, { status: 200, statusText: 'OK' }));

            const response = await client.open({ url: 'https://x.test/a.pdf', userAgent: 'test-agent' });

            expect(response.body).toBe(content);
        });

        it('should let transport failures through unchanged', async () => {
            const failure = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
            mockedFetch.mockRejectedValueOnce(failure);

            await expect(client.open({ url: 'https://x.test/a.pdf', userAgent: 'test-agent' })).rejects.toBe(failure);
        });

        it('should merge configured headers', async () => {
            client = new HttpClient(silentLogger, { headers: { 'X-Trace': 'abc' }, maxRedirects: 3 });
            mockedFetch.mockResolvedValueOnce(respond(200, 'OK'));

            await client.open({ url: 'https://x.test/a.pdf', userAgent: 'test-agent' });

            const init = mockedFetch.mock.calls[0][1];
            expect(init?.headers).toEqual(expect.objectContaining({ 'X-Trace': 'abc', 'User-Agent': 'test-agent' }));
            expect(init?.follow).toBe(3);
            expect(client.getConfig().maxRedirects).toBe(3);
        });
    });

    describe('probeRangeSupport', () => {
        it('should report byte-range support from a HEAD request', async () => {
            mockedFetch.mockResolvedValueOnce(respond(200, 'OK', { 'accept-ranges': 'bytes', 'content-length': '1000' }));

            const probe = await client.probeRangeSupport({ url: 'https://x.test/a.pdf', userAgent: 'test-agent' });

            expect(mockedFetch.mock.calls[0][1]?.method).toBe('HEAD');
            expect(probe).toEqual({ supported: true, contentLength: 1000 });
        });

        it('should report no support when ranges are not advertised', async () => {
            mockedFetch.mockResolvedValueOnce(respond(200, 'OK', { 'accept-ranges': 'none' }));

            const probe = await client.probeRangeSupport({ url: 'https://x.test/a.pdf', userAgent: 'test-agent' });

            expect(probe.supported).toBe(false);
        });

        it('should report no support for error statuses', async () => {
            mockedFetch.mockResolvedValueOnce(respond(405, 'Method Not Allowed', { 'accept-ranges': 'bytes' }));

            const probe = await client.probeRangeSupport({ url: 'https://x.test/a.pdf', userAgent: 'test-agent' });

            expect(probe).toEqual({ supported: false });
        });

        it('should report no support when the probe fails', async () => {
            mockedFetch.mockRejectedValueOnce(new Error('socket hang up'));

            const probe = await client.probeRangeSupport({ url: 'https://x.test/a.pdf', userAgent: 'test-agent' });

            expect(probe).toEqual({ supported: false });
        });
    });
});

describe('header parsing', () => {
    it('should parse Content-Range values', () => {
        expect(parseContentRange('bytes 0-99/200')).toEqual({ start: 0, end: 99, total: 200 });
        expect(parseContentRange('bytes 100-199/*')).toEqual({ start: 100, end: 199, total: undefined });
        expect(parseContentRange('items 0-1/2')).toBeUndefined();
        expect(parseContentRange(null)).toBeUndefined();
    });

    it('should parse Content-Length values', () => {
        expect(parseContentLength('42')).toBe(42);
        expect(parseContentLength('abc')).toBeUndefined();
        expect(parseContentLength(null)).toBeUndefined();
    });
});
