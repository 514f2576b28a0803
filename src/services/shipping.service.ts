import { ZodError, ZodTypeAny, z } from 'zod';
import { ClientOptions, FraktjaktClient } from '../carriers/fraktjakt/carrier';
import { AppConfig } from '../config';
import { FraktjaktError, MissingInformationError } from '../domain/errors';
import { OrderResult, SearchResult, TrackResult } from '../domain/models';
import {
    OrderRequest,
    QuoteRequest,
    TrackRequest,
    orderRequestSchema,
    quoteRequestSchema,
    trackOptionsSchema,
} from '../domain/schemas';
import { toMissingInformationError } from '../domain/validation';
import { Operation, OperationLogRepository } from '../db/repository';
import { Logger, createConsoleLogger, errorToLog } from '../logging/logger';
import { rankByPrice } from './search-results';

function generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).substring(2, 8)}`;
}

export type ClientFactory = (options: ClientOptions) => FraktjaktClient;

export interface QuoteResponse {
    requestId: string;
    shipmentId: number;
    warning?: string;
    results: SearchResult[];
    requestedAt: Date;
}

export interface OrderResponse extends OrderResult {
    requestId: string;
    requestedAt: Date;
}

export interface TrackingResponse {
    requestId: string;
    warning?: string;
    results: TrackResult[];
    requestedAt: Date;
}

interface ShippingServiceDeps {
    config: AppConfig;
    clientFactory?: ClientFactory;
    operationLog?: OperationLogRepository;   // optional, the service works without a database
    logger?: Logger;
}

/**
 * Request-scoped entry point: every call validates its input, opens its own
 * client session and records the outcome, input errors included.
 */
export class ShippingService {
    private config: AppConfig;
    private clientFactory: ClientFactory;
    private operationLog?: OperationLogRepository;
    private logger: Logger;

    constructor(deps: ShippingServiceDeps) {
        this.config = deps.config;
        this.clientFactory = deps.clientFactory ?? (options => new FraktjaktClient(options));
        this.operationLog = deps.operationLog;
        this.logger = deps.logger ?? createConsoleLogger({ prefix: 'shipping', debug: deps.config.debug });
    }

    async getQuotes(rawRequest: unknown): Promise<QuoteResponse> {
        const requestId = generateRequestId();

        const result = await this.run('quote', requestId, async () => {
            const request: QuoteRequest = parseRequest(quoteRequestSchema, rawRequest, 'quote request');
            const { parcels, ...options } = request;
            const client = this.openClient();
            for (const parcel of parcels) {
                client.addParcel(parcel);
            }
            return client.quote(options);
        }, quote => quote.shipmentId);

        return {
            requestId,
            shipmentId: result.shipmentId,
            ...(result.warning ? { warning: result.warning } : {}),
            results: rankByPrice(result.results),
            requestedAt: new Date(),
        };
    }

    async placeOrder(rawRequest: unknown): Promise<OrderResponse> {
        const requestId = generateRequestId();

        const result = await this.run('order', requestId, async () => {
            const request: OrderRequest = parseRequest(orderRequestSchema, rawRequest, 'order request');
            const { commodities, ...options } = request;
            const client = this.openClient();
            for (const commodity of commodities) {
                client.addCommodity(commodity);
            }
            return client.order(options);
        }, order => order.shipmentId);

        return {
            requestId,
            ...result,
            requestedAt: new Date(),
        };
    }

    async trackShipment(rawRequest: unknown): Promise<TrackingResponse> {
        const requestId = generateRequestId();

        const result = await this.run('track', requestId, () => {
            const request: TrackRequest = parseRequest(trackOptionsSchema, rawRequest, 'track request');
            return this.openClient().track(request);
        });

        return {
            requestId,
            ...(result.warning ? { warning: result.warning } : {}),
            results: result.results,
            requestedAt: new Date(),
        };
    }

    private openClient(): FraktjaktClient {
        const { fraktjakt } = this.config;
        return this.clientFactory({
            consignorId: fraktjakt.consignorId,
            consignorKey: fraktjakt.consignorKey,
            currency: fraktjakt.currency,
            language: fraktjakt.language,
            environment: fraktjakt.environment,
            baseUrls: fraktjakt.baseUrls,
            timeoutMs: this.config.requestTimeoutMs,
            debug: this.config.debug,
        });
    }

    private async run<T>(
        operation: Operation,
        requestId: string,
        call: () => Promise<T>,
        shipmentIdOf?: (result: T) => number,
    ): Promise<T> {
        const start = Date.now();
        try {
            const result = await call();
            await this.record({
                requestId,
                operation,
                status: 'success',
                durationMs: Date.now() - start,
                shipmentId: shipmentIdOf?.(result),
            });
            return result;
        } catch (err) {
            this.logger.warn(`${operation} failed`, { requestId, ...errorToLog(err) });
            await this.record({
                requestId,
                operation,
                status: 'error',
                durationMs: Date.now() - start,
                errorCode: err instanceof FraktjaktError || err instanceof MissingInformationError ? err.code : 'UNKNOWN',
                errorMsg: err instanceof Error ? err.message : 'unknown error',
            });
            throw err;
        }
    }

    private async record(entry: {
        requestId: string;
        operation: Operation;
        status: 'success' | 'error';
        durationMs: number;
        shipmentId?: number;
        errorCode?: string;
        errorMsg?: string;
    }): Promise<void> {
        if (!this.operationLog) {
            return;
        }
        try {
            await this.operationLog.logOperation({
                ...entry,
                environment: this.config.fraktjakt.environment,
            });
        } catch (err) {
            this.logger.warn('Failed to record operation', { requestId: entry.requestId, ...errorToLog(err) });
        }
    }
}

function parseRequest<S extends ZodTypeAny>(schema: S, rawRequest: unknown, label: string): z.infer<S> {
    try {
        return schema.parse(rawRequest);
    } catch (err) {
        if (err instanceof ZodError) {
            throw toMissingInformationError(err, label);
        }
        throw err;
    }
}
