import nodeFetch, { RequestInit, Response } from 'node-fetch';
import { Readable } from 'stream';
import {
    ContentRange,
    IHttpTransport,
    ProbeRequest,
    RangeProbe,
    TransferRequest,
    TransferResponse
} from '../../domain/interfaces/IHttpTransport';
import { parseRetryAfter } from '../../domain/services/BackoffPolicy';
import { HttpStatusError } from '../../shared/errors/AppError';
import { Logger } from '../../shared/logging/Logger';

/**
 * Identification strings the engine rotates through when a server appears
 * to be blocking the client
 */
export const DEFAULT_USER_AGENTS: readonly string[] = [
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:109.0) Gecko/20100101 Firefox/121.0',
    'curl/8.0.1'
];

export interface HttpClientConfig {
    headers?: Record<string, string>;
    maxRedirects?: number;
}

export class HttpClient implements IHttpTransport {
    private config: Required<HttpClientConfig>;

    constructor(
        private logger: Logger,
        config: HttpClientConfig = {}
    ) {
        this.config = {
            headers: {},
            maxRedirects: 10,
            ...config
        };
    }

    async open(request: TransferRequest): Promise<TransferResponse> {
        const headers: Record<string, string> = {
            ...this.baseHeaders(request.userAgent),
            Accept: 'application/pdf,application/octet-stream,*/*'
        };

        if (request.rangeStart !== undefined && request.rangeStart > 0) {
            headers.Range = `bytes=${request.rangeStart}-`;
        }

        this.logger.debug(`HTTP GET ${request.url}`, { range: headers.Range });

        const response = await nodeFetch(request.url, this.requestOptions('GET', headers, request.signal));
        const body = toReadable(response.body);

        if (!response.ok) {
            // The body of an error page is of no use
            body.destroy();
            throw new HttpStatusError(
                response.status,
                response.statusText,
                parseRetryAfter(response.headers.get('retry-after'))
            );
        }

        return {
            status: response.status,
            statusText: response.statusText,
            contentLength: parseContentLength(response.headers.get('content-length')),
            contentRange: parseContentRange(response.headers.get('content-range')),
            body
        };
    }

    async probeRangeSupport(request: ProbeRequest): Promise<RangeProbe> {
        let response: Response;
        try {
            response = await nodeFetch(
                request.url,
                this.requestOptions('HEAD', this.baseHeaders(request.userAgent), request.signal)
            );
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.debug(`Range probe failed for ${request.url}: ${message}`);
            return { supported: false };
        }

        if (!response.ok) {
            this.logger.debug(`Range probe for ${request.url} returned HTTP ${response.status}`);
            return { supported: false };
        }

        const acceptRanges = response.headers.get('accept-ranges') ?? '';
        return {
            supported: acceptRanges.toLowerCase().split(',').map(v => v.trim()).includes('bytes'),
            contentLength: parseContentLength(response.headers.get('content-length'))
        };
    }

    private baseHeaders(userAgent: string): Record<string, string> {
        return {
            ...this.config.headers,
            'User-Agent': userAgent,
            // Byte offsets must refer to the stored representation
            'Accept-Encoding': 'identity'
        };
    }

    private requestOptions(
        method: 'GET' | 'HEAD',
        headers: Record<string, string>,
        signal?: AbortSignal
    ): RequestInit {
        return {
            method,
            headers,
            redirect: 'follow',
            follow: this.config.maxRedirects,
            compress: false,
            signal
        };
    }

    /**
     * Get current configuration
     */
    getConfig(): Readonly<Required<HttpClientConfig>> {
        return { ...this.config };
    }
}

function toReadable(body: NodeJS.ReadableStream): Readable {
    return body instanceof Readable ? body : Readable.from(body);
}

export function parseContentLength(value: string | null): number | undefined {
    if (value === null || !/^\s*\d+\s*$/.test(value)) {
        return undefined;
    }
    return Number(value.trim());
}

/**
 * Parse `bytes start-end/total` (total may be `*`)
 */
export function parseContentRange(value: string | null): ContentRange | undefined {
    if (!value) {
        return undefined;
    }

    const match = /^\s*bytes\s+(\d+)-(\d+)\/(\d+|\*)\s*$/i.exec(value);
    if (!match) {
        return undefined;
    }

    const [, start, end, total] = match;
    return {
        start: Number(start),
        end: Number(end),
        total: total === '*' ? undefined : Number(total)
    };
}
