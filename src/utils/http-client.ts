import { DEFAULT_USER_AGENTS } from '../types/index.js';
import { AbortedError, randomBetween, sleep } from './async.js';
import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string;
    timeoutMs?: number;
    /** Run-level cancellation; aborting it fails the request with a timeout */
    signal?: AbortSignal;
}

/**
 * HTTP response wrapper. Bodies are kept as text; callers decode them.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    body: string;
    ok: boolean;
}

/**
 * HTTP error with classification.
 * `status` is 0 for network failures and timeouts.
 */
export class HttpError extends Error {
    public readonly body?: string;
    public readonly timedOut: boolean;

    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        options: { body?: string; timedOut?: boolean } = {}
    ) {
        super(message);
        this.name = 'HttpError';
        this.body = options.body;
        this.timedOut = options.timedOut ?? false;
    }
}

/**
 * Raised when a response body cannot be decoded.
 */
export class ResponseParseError extends Error {
    constructor(message: string, public readonly url: string) {
        super(message);
        this.name = 'ResponseParseError';
    }
}

export interface HttpClientOptions {
    timeoutMs?: number;
    maxRetries?: number;
    /** Random politeness delay before every request */
    delayRangeMs?: [number, number];
    /** Rotated round-robin on every request */
    userAgents?: readonly string[];
    fetch?: typeof fetch;
    random?: () => number;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Centralized HTTP client with politeness delays, rotating User-Agent and retry logic.
 */
export class HttpClient {
    private requestCount = 0;
    private agentCursor = 0;
    private readonly timeoutMs: number;
    private readonly maxRetries: number;
    private readonly delayRangeMs: [number, number];
    private readonly userAgents: readonly string[];
    private readonly fetchImpl: typeof fetch;
    private readonly random: () => number;
    private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

    constructor(options: HttpClientOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? 15000;
        this.maxRetries = options.maxRetries ?? 3;
        this.delayRangeMs = options.delayRangeMs ?? [1000, 3000];
        this.userAgents = options.userAgents && options.userAgents.length > 0 ? options.userAgents : DEFAULT_USER_AGENTS;
        this.fetchImpl = options.fetch ?? globalThis.fetch;
        this.random = options.random ?? Math.random;
        this.sleep = options.sleep ?? sleep;
    }

    /**
     * Make an HTTP request with politeness delay and retry.
     */
    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const { method = 'GET', headers = {}, body, timeoutMs = this.timeoutMs, signal } = options;
        const logger = getLogger();

        const initialBackoff = 1000;
        const maxBackoff = 30000;

        for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
            await this.politenessDelay(url, signal);
            this.requestCount++;

            const requestHeaders: Record<string, string> = {
                'User-Agent': this.nextUserAgent(),
                ...headers,
            };

            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
            const onRunAbort = (): void => controller.abort();
            signal?.addEventListener('abort', onRunAbort, { once: true });

            try {
                const response = await this.fetchImpl(url, {
                    method,
                    headers: requestHeaders,
                    body,
                    signal: controller.signal,
                });
                const text = await response.text();

                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });

                if (!response.ok) {
                    const retryable = RETRYABLE_STATUS_CODES.has(response.status);

                    if (retryable && attempt < this.maxRetries) {
                        const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
                        const backoff = retryAfter ?? this.calculateBackoff(attempt, initialBackoff, maxBackoff);

                        logger.warn(
                            { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                            `Retryable HTTP error, backing off`
                        );
                        await this.backoff(backoff, url, signal);
                        continue;
                    }

                    throw new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status, retryable, {
                        body: text,
                    });
                }

                return { status: response.status, headers: responseHeaders, body: text, ok: true };
            } catch (error) {
                if (error instanceof HttpError) throw error;

                if (signal?.aborted) {
                    throw new HttpError(`Run cancelled: ${url}`, 0, false, { timedOut: true });
                }
                const timedOut = error instanceof Error && error.name === 'AbortError';
                const errorCode = timedOut ? 'ETIMEDOUT' : networkErrorCode(error);
                const retryable = errorCode ? RETRYABLE_ERROR_CODES.has(errorCode) : false;

                if (retryable && attempt < this.maxRetries) {
                    const backoff = this.calculateBackoff(attempt, initialBackoff, maxBackoff);
                    logger.warn({ errorCode, attempt: attempt + 1, backoffMs: backoff, url }, `Retryable network error, backing off`);
                    await this.backoff(backoff, url, signal);
                    continue;
                }

                if (timedOut) {
                    throw new HttpError(`Request timeout after ${timeoutMs}ms: ${url}`, 0, true, { timedOut: true });
                }
                throw new HttpError(`Network error: ${error instanceof Error ? error.message : String(error)}`, 0, retryable);
            } finally {
                clearTimeout(timeoutId);
                signal?.removeEventListener('abort', onRunAbort);
            }
        }

        throw new HttpError(`Max retries exceeded for ${url}`, 0, false);
    }

    /**
     * GET a URL and return its body as text.
     */
    async getText(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<string> {
        const response = await this.request(url, { ...options, method: 'GET' });
        return response.body;
    }

    /**
     * GET a URL and decode its body as JSON. The result is unvalidated.
     */
    async getJson(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<unknown> {
        const text = await this.getText(url, {
            ...options,
            headers: { Accept: 'application/json', ...options?.headers },
        });
        try {
            const parsed: unknown = JSON.parse(text);
            return parsed;
        } catch (error) {
            throw new ResponseParseError(
                `Invalid JSON from ${url}: ${error instanceof Error ? error.message : String(error)}`,
                url
            );
        }
    }

    /**
     * Number of network attempts made, retries included.
     */
    getRequestCount(): number {
        return this.requestCount;
    }

    private nextUserAgent(): string {
        const agent = this.userAgents[this.agentCursor % this.userAgents.length] ?? DEFAULT_USER_AGENTS[0] ?? 'Mozilla/5.0';
        this.agentCursor++;
        return agent;
    }

    private async politenessDelay(url: string, signal?: AbortSignal): Promise<void> {
        await this.backoff(randomBetween(this.delayRangeMs, this.random), url, signal);
    }

    private async backoff(ms: number, url: string, signal?: AbortSignal): Promise<void> {
        try {
            await this.sleep(ms, signal);
        } catch (error) {
            if (error instanceof AbortedError || signal?.aborted) {
                throw new HttpError(`Run cancelled: ${url}`, 0, false, { timedOut: true });
            }
            throw error;
        }
    }

    private parseRetryAfter(header: string | null): number | null {
        if (!header) return null;

        // Try parsing as seconds
        const seconds = parseInt(header, 10);
        if (!isNaN(seconds)) return seconds * 1000;

        // Try parsing as HTTP date
        const date = new Date(header);
        if (!isNaN(date.getTime())) {
            return Math.max(0, date.getTime() - Date.now());
        }

        return null;
    }

    private calculateBackoff(attempt: number, initial: number, max: number): number {
        // Exponential backoff with jitter
        const exponential = initial * Math.pow(2, attempt);
        const jitter = this.random() * exponential * 0.5;
        return Math.min(max, exponential + jitter);
    }
}

/**
 * Node attaches the socket error code either on the error or on its `cause`.
 */
function networkErrorCode(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    if ('code' in error && typeof error.code === 'string') return error.code;
    const cause = error.cause;
    if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') return cause.code;
    return undefined;
}

/**
 * Create an HTTP client from run configuration.
 */
export function createHttpClient(config: {
    requestTimeoutMs: number;
    maxRetries: number;
    delayRangeMs: [number, number];
    userAgents: readonly string[];
}): HttpClient {
    return new HttpClient({
        timeoutMs: config.requestTimeoutMs,
        maxRetries: config.maxRetries,
        delayRangeMs: config.delayRangeMs,
        userAgents: config.userAgents,
    });
}
