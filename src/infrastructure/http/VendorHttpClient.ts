import axios, { AxiosProxyConfig } from 'axios';
import { getConfig } from '../../config';
import {
    AuthorizationError,
    ConfigurationError,
    NetworkError,
} from '../../domain/errors/TranslationErrors';

/**
 * Scheme ("http" / "https") to proxy address, e.g. { https: 'http://10.0.0.1:3128' }.
 */
export interface ProxyMap {
    http?: string;
    https?: string;
}

export interface TransportOptions {
    proxies?: ProxyMap;
    /** Per-request timeout; defaults to TRANSLATOR_TIMEOUT_MS or 30s. */
    timeoutMs?: number;
}

export type QueryValue = string | number | boolean | string[];

export interface VendorRequest {
    method: 'GET' | 'POST';
    url: string;
    params?: Record<string, QueryValue>;
    data?: unknown;
    headers?: Record<string, string>;
    /** "text" for scraped HTML pages. */
    responseType?: 'json' | 'text';
}

/**
 * Converts the proxy entry matching the endpoint scheme into axios form.
 */
export function toAxiosProxy(url: string, proxies?: ProxyMap): AxiosProxyConfig | undefined {
    if (!proxies) {
        return undefined;
    }

    const scheme = new URL(url).protocol === 'https:' ? 'https' : 'http';
    const address = proxies[scheme];
    if (!address) {
        return undefined;
    }

    let parsed: URL;
    try {
        parsed = new URL(address.includes('://') ? address : `http://${address}`);
    } catch {
        throw new ConfigurationError(`Invalid ${scheme} proxy address: ${address}`);
    }

    const protocol = parsed.protocol.replace(':', '');
    const proxy: AxiosProxyConfig = {
        protocol,
        host: parsed.hostname,
        port: parsed.port ? Number(parsed.port) : (protocol === 'https' ? 443 : 80),
    };
    if (parsed.username) {
        proxy.auth = {
            username: decodeURIComponent(parsed.username),
            password: decodeURIComponent(parsed.password),
        };
    }
    return proxy;
}

/**
 * Thin axios wrapper shared by every vendor adapter.
 *
 * Maps transport failures and non-2xx responses to NetworkError subclasses
 * carrying the vendor payload. Does not retry.
 */
export class VendorHttpClient {
    private readonly timeoutMs: number;

    constructor(
        private readonly backend: string,
        private readonly options: TransportOptions = {}
    ) {
        this.timeoutMs = options.timeoutMs ?? getConfig().requestTimeoutMs;
    }

    async request<T>(request: VendorRequest): Promise<T> {
        try {
            const response = await axios.request<T>({
                method: request.method,
                url: request.url,
                params: request.params,
                data: request.data,
                headers: request.headers,
                timeout: this.timeoutMs,
                proxy: toAxiosProxy(request.url, this.options.proxies),
                responseType: request.responseType ?? 'json',
                // Repeated keys (to=de&to=fr) instead of to[]=de
                paramsSerializer: { indexes: null },
            });
            return response.data;
        } catch (error) {
            throw this.toNetworkError(error);
        }
    }

    private toNetworkError(error: unknown): Error {
        if (!axios.isAxiosError(error)) {
            return error instanceof Error ? error : new NetworkError(`${this.backend} request failed: ${String(error)}`);
        }

        const status = error.response?.status;
        const payload: unknown = error.response?.data;

        if (status === undefined) {
            return new NetworkError(`${this.backend} request failed: ${error.message}`, undefined, payload);
        }
        if (status === 401 || status === 403) {
            return new AuthorizationError(this.backend, status, payload);
        }
        if (status === 429) {
            return new NetworkError(
                `${this.backend} rejected the request: too many requests`,
                status,
                payload,
                'TOO_MANY_REQUESTS'
            );
        }
        return new NetworkError(`${this.backend} request failed with HTTP ${status}`, status, payload);
    }
}
