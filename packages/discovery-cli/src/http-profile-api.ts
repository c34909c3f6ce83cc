/**
 * HTTP Profile API
 *
 * ProfileApi transport over the provider's REST endpoints. Returns the
 * provider's response envelope untouched; retries, rate-limit handling and
 * validation belong to the discovery-core gateway.
 */

import { isRecord } from '@profile-graph/discovery-core';
import type { ProfileApi } from '@profile-graph/discovery-core';
import { httpGet, isSuccessStatus } from './http-utils';
import type { HttpResponse } from './http-utils';

export const FULL_PROFILE_PATH = '/api/v1/profile/full';
export const SIMILAR_PROFILES_PATH = '/api/v1/profile/similar';
export const API_KEY_HEADER = 'X-linkdapi-apikey';

const BODY_EXCERPT_LENGTH = 200;
const RATE_LIMIT_STATUS = 429;

export interface HttpProfileApiOptions {
    apiKey: string;
    baseUrl: string;
    /** Socket timeout per request. Default: 30000 */
    timeoutMs?: number;
}

/**
 * Turn an HTTP response into the provider envelope.
 *
 * - empty body: `null` on 2xx
 * - JSON body: returned as parsed on 2xx, and on other statuses when it is
 *   an envelope carrying `success`
 * - anything else, and every 429, throws `HTTP <status> <excerpt>`
 */
export function parseResponseBody(response: HttpResponse): unknown {
    const body = response.body.trim();
    const ok = isSuccessStatus(response.statusCode);
    const failure = () => new Error(
        body ? `HTTP ${response.statusCode} ${body.slice(0, BODY_EXCERPT_LENGTH)}` : `HTTP ${response.statusCode}`
    );

    if (response.statusCode === RATE_LIMIT_STATUS) {
        throw failure();
    }

    if (!body) {
        if (ok) {
            return null;
        }
        throw failure();
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(body);
    } catch {
        throw failure();
    }

    if (ok || (isRecord(parsed) && 'success' in parsed)) {
        return parsed;
    }
    throw failure();
}

export class HttpProfileApi implements ProfileApi {
    private readonly baseUrl: string;

    constructor(private readonly options: HttpProfileApiOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    }

    getFullProfile(username: string): Promise<unknown> {
        return this.get(FULL_PROFILE_PATH, { username });
    }

    getSimilarProfiles(urn: string): Promise<unknown> {
        return this.get(SIMILAR_PROFILES_PATH, { urn });
    }

    private async get(pathname: string, query: Record<string, string>): Promise<unknown> {
        const url = `${this.baseUrl}${pathname}?${new URLSearchParams(query).toString()}`;
        const response = await httpGet(url, {
            headers: { [API_KEY_HEADER]: this.options.apiKey },
            timeout: this.options.timeoutMs,
        });
        return parseResponseBody(response);
    }
}
