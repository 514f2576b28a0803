import axios, {
    AxiosInstance,
    AxiosRequestConfig,
    AxiosResponse,
    InternalAxiosRequestConfig,
} from 'axios';
import { FraktjaktError, TransportError } from '../domain/errors';
import { Logger, silentLogger } from '../logging/logger';

export interface HttpClientOptions {
    baseURL?: string;
    timeoutMs: number;
    defaultHeaders?: Record<string, string>;
    logger?: Logger;
}

export interface HttpResponse<T = unknown> {
    status: number;
    data: T;
    headers: Record<string, string>;
}

/** The one outbound call each operation makes. */
export interface Transport {
    get<T>(url: string, config?: AxiosRequestConfig): Promise<HttpResponse<T>>;
}

// success and redirect statuses reach the interpreter, anything else is a transport failure
export function isAcceptedStatus(status: number): boolean {
    return status >= 200 && status < 400;
}

export class HttpClient implements Transport {
    private client: AxiosInstance;
    private service: string;
    private logger: Logger;
    private startTimes = new WeakMap<InternalAxiosRequestConfig, number>();

    constructor(service: string, options: HttpClientOptions) {
        this.service = service;
        this.logger = options.logger ?? silentLogger;
        this.client = axios.create({
            baseURL: options.baseURL,
            timeout: options.timeoutMs,
            validateStatus: isAcceptedStatus,
            headers: {
                'Accept': 'application/xml, text/xml',
                ...options.defaultHeaders,
            },
        });
        this.client.interceptors.request.use((config: InternalAxiosRequestConfig) => {
            this.startTimes.set(config, Date.now());
            return config;
        });
        this.client.interceptors.response.use((response: AxiosResponse) => {
            const startedAt = this.startTimes.get(response.config);
            this.logger.debug(`${this.service} responded`, {
                status: response.status,
                durationMs: startedAt === undefined ? undefined : Date.now() - startedAt,
            });
            return response;
        });
    }

    async get<T>(url: string, config?: AxiosRequestConfig): Promise<HttpResponse<T>> {
        try {
            const response: AxiosResponse<T> = await this.client.get(url, config);
            return this.wrapResponse(response);
        } catch (err) {
            throw this.handleError(err);
        }
    }

    private wrapResponse<T>(response: AxiosResponse<T>): HttpResponse<T> {
        const headers: Record<string, string> = {};
        for (const [name, value] of Object.entries(response.headers ?? {})) {
            if (value !== undefined && value !== null) headers[name] = String(value);
        }
        return {
            status: response.status,
            data: response.data,
            headers,
        };
    }

    // no retries: every failure surfaces as the fixed connectivity error
    private handleError(err: unknown): FraktjaktError {
        if (!axios.isAxiosError(err)) {
            return new TransportError(undefined, err instanceof Error ? err : undefined);
        }
        const status = err.response?.status;
        this.logger.warn(`${this.service} request failed`, {
            code: err.code,
            status,
            message: err.message,
        });
        return new TransportError(status, err);
    }
}
