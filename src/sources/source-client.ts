import { HttpError, type HttpClient, type QueryParams } from '../utils/http-client.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { SourceError, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/** Characters of a non-2xx body kept in a diagnostic */
const BODY_EXCERPT_LENGTH = 300;

export interface SourceClientOptions {
    /** Source tag, used for errors, logging and request counting */
    name: string;
    baseUrl: string;
    httpClient: HttpClient;
    minIntervalMs: number;
    timeoutMs: number;
    /** Headers sent on every request (credentials, ...) */
    headers?: Record<string, string>;
    /** Query parameters sent on every request (mailto, api_key, ...) */
    params?: QueryParams;
}

export interface GetJsonOptions {
    /** Resolve to null on 404 instead of failing (path lookups) */
    notFoundOn404?: boolean;
}

/**
 * Per-adapter dispatch helper: rate limiting, timeout, auth and error mapping
 * in one place, so adapters only describe their endpoints and schemas.
 */
export class SourceClient {
    readonly name: string;
    readonly limiter: RateLimiter;
    private readonly baseUrl: string;
    private readonly httpClient: HttpClient;
    private readonly timeoutMs: number;
    private readonly headers: Record<string, string>;
    private readonly params: QueryParams;

    constructor(options: SourceClientOptions) {
        this.name = options.name;
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.httpClient = options.httpClient;
        this.timeoutMs = options.timeoutMs;
        this.headers = options.headers ?? {};
        this.params = options.params ?? {};
        this.limiter = new RateLimiter(options.minIntervalMs);
    }

    /**
     * GET `baseUrl + path` and return the parsed JSON body.
     * Every transport failure surfaces as a SourceError.
     */
    async getJson(path: string, params: QueryParams = {}, options: GetJsonOptions = {}): Promise<unknown> {
        await this.limiter.wait();

        const url = `${this.baseUrl}${path}`;
        getLogger().debug({ source: this.name, url, params }, 'Source request');

        try {
            const response = await this.httpClient.getJson(url, {
                params: { ...this.params, ...params },
                headers: this.headers,
                timeout: this.timeoutMs,
                source: this.name,
            });
            return response.data;
        } catch (error) {
            if (error instanceof HttpError) {
                if (options.notFoundOn404 && error.kind === 'status' && error.status === 404) {
                    return null;
                }
                throw new SourceError(this.name, diagnose(error), { cause: error });
            }
            throw new SourceError(this.name, describeError(error), { cause: error });
        }
    }
}

/**
 * Short, user-safe description of a transport failure.
 */
export function diagnose(error: HttpError): string {
    switch (error.kind) {
        case 'status':
            return `HTTP ${error.status}: ${(error.body ?? '').slice(0, BODY_EXCERPT_LENGTH)}`;
        case 'timeout':
            return 'timeout';
        case 'network':
            return 'network error';
        case 'parse':
            return 'invalid JSON response';
        case 'closed':
            return 'client closed';
    }
}
