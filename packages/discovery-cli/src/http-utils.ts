/**
 * Cross-platform HTTP utilities
 * Uses native Node.js http/https modules
 */

import * as https from 'https';
import * as http from 'http';

export interface HttpResponse {
    statusCode: number;
    body: string;
    headers: http.IncomingHttpHeaders;
}

/**
 * Make an HTTP GET request using native Node.js modules
 *
 * @param url The URL to fetch
 * @param options Optional request options
 * @returns Promise resolving to the response
 */
export function httpGet(url: string, options?: {
    headers?: Record<string, string>;
    timeout?: number;
}): Promise<HttpResponse> {
    return new Promise((resolve, reject) => {
        const urlObj = new URL(url);
        const isHttps = urlObj.protocol === 'https:';
        const client = isHttps ? https : http;

        const requestOptions: https.RequestOptions = {
            hostname: urlObj.hostname,
            port: urlObj.port || (isHttps ? 443 : 80),
            path: urlObj.pathname + urlObj.search,
            method: 'GET',
            headers: {
                'User-Agent': 'profile-graph-cli',
                'Accept': 'application/json',
                ...options?.headers
            },
            timeout: options?.timeout || 30000
        };

        const req = client.request(requestOptions, (res) => {
            let body = '';

            res.setEncoding('utf-8');
            res.on('data', (chunk) => {
                body += chunk;
            });

            res.on('end', () => {
                resolve({
                    statusCode: res.statusCode || 0,
                    body,
                    headers: res.headers
                });
            });
        });

        req.on('error', (error) => {
            reject(error);
        });

        req.on('timeout', () => {
            req.destroy();
            reject(new Error('Request timed out'));
        });

        req.end();
    });
}

export function isSuccessStatus(statusCode: number): boolean {
    return statusCode >= 200 && statusCode < 300;
}
