import { getLogger } from './logger.js';

/**
 * Failure classes for an HTTP exchange.
 */
export type HttpErrorKind = 'status' | 'timeout' | 'network' | 'parse' | 'closed';

/**
 * Query string parameters; undefined values are dropped.
 */
export type QueryParams = Record<string, string | number | undefined>;

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    params?: QueryParams;
    timeout?: number;
    source?: string;  // For per-source request counting
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

/**
 * HTTP error with classification.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly kind: HttpErrorKind,
        public readonly status: number = 0,
        public readonly body?: string
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export interface HttpClientOptions {
    /** Default per-request timeout in ms */
    timeout?: number;
    /** Client identifier sent as User-Agent */
    userAgent?: string;
    /** Contact address appended to the User-Agent */
    email?: string;
}

/**
 * Shared outbound transport for every source adapter.
 *
 * Created once at startup and closed once at shutdown. Performs exactly one
 * attempt per request: pacing belongs to each adapter's RateLimiter, and a
 * failed attempt is final.
 */
export class HttpClient {
    private requestCounts = new Map<string, number>();
    private inFlight = new Set<AbortController>();
    private closed = false;
    private readonly defaultTimeout: number;
    readonly userAgent: string;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 15000;
        const base = options?.userAgent ?? 'litsearch/1.0.0';
        this.userAgent = options?.email ? `${base} (mailto:${options.email})` : base;
    }

    /**
     * GET a URL and parse the body as JSON.
     */
    async getJson(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<unknown>> {
        const response = await this.get(url, options);
        if (response.data.trim() === '') {
            return { ...response, data: null };
        }
        try {
            return { ...response, data: JSON.parse(response.data) as unknown };
        } catch {
            throw new HttpError(`Invalid JSON from ${url}`, 'parse', response.status, response.data);
        }
    }

    /**
     * GET a URL and return the body as text. Non-2xx responses throw.
     */
    async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<string>> {
        const {
            headers = {},
            params,
            timeout = this.defaultTimeout,
            source = 'default',
        } = options;

        if (this.closed) {
            throw new HttpError('HTTP client is closed', 'closed');
        }

        const target = withParams(url, params);
        this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

        const controller = new AbortController();
        let timedOut = false;
        const timeoutId = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, timeout);
        this.inFlight.add(controller);

        try {
            const response = await fetch(target, {
                method: 'GET',
                headers: { 'User-Agent': this.userAgent, Accept: 'application/json', ...headers },
                signal: controller.signal,
            });
            const data = await response.text();

            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            if (!response.ok) {
                throw new HttpError(
                    `HTTP ${response.status}: ${response.statusText}`,
                    'status',
                    response.status,
                    data
                );
            }

            return { status: response.status, headers: responseHeaders, data, ok: true };
        } catch (error) {
            if (error instanceof HttpError) throw error;

            if (timedOut) {
                throw new HttpError(`Request timeout after ${timeout}ms: ${target}`, 'timeout');
            }
            if (this.closed) {
                throw new HttpError(`Request aborted, client closed: ${target}`, 'closed');
            }

            getLogger().debug({ url: target, error }, 'Network error');
            throw new HttpError(
                `Network error: ${error instanceof Error ? error.message : String(error)}`,
                'network'
            );
        } finally {
            clearTimeout(timeoutId);
            this.inFlight.delete(controller);
        }
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    /**
     * Reset request counts.
     */
    resetCounts(): void {
        this.requestCounts.clear();
    }

    get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Abort in-flight requests and refuse new ones.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        for (const controller of this.inFlight) {
            controller.abort();
        }
        this.inFlight.clear();
    }
}

/**
 * Append query parameters to a URL, skipping undefined values.
 */
export function withParams(url: string, params?: QueryParams): string {
    if (!params) return url;

    const target = new URL(url);
    for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
            target.searchParams.set(key, String(value));
        }
    }
    return target.toString();
}
