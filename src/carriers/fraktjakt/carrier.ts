import {
    Commodity,
    Environment,
    OrderOptions,
    OrderResult,
    Parcel,
    QuoteOptions,
    QuoteResult,
    TrackOptions,
    TrackResponse,
} from '../../domain/models';
import { MissingInformationError, TransportError } from '../../domain/errors';
import {
    clientOptionsSchema,
    commoditySchema,
    orderOptionsSchema,
    parcelSchema,
    quoteOptionsSchema,
    trackOptionsSchema,
} from '../../domain/schemas';
import { checkRequiredOptions, validateOptions } from '../../domain/validation';
import { DEFAULT_BASE_URLS } from '../../config';
import { HttpClient, Transport, isAcceptedStatus } from '../../http/client';
import { Logger, createConsoleLogger, truncate } from '../../logging/logger';
import {
    Consignor,
    buildOrderDocument,
    buildShipmentDocument,
    encodeDocument,
    serializeDocument,
    toInteger,
} from './mapper';
import { decodeBody, interpretOrderReply, interpretQuoteReply, interpretTrackReply } from './interpreter';
import { RawBody, RequestDocument } from './types';

export const ENDPOINTS = {
    quote: '/fraktjakt/query_xml',
    order: '/orders/order_xml',
    track: '/trace/xml_trace',
} as const;

const DEFAULT_TIMEOUT_MS = 15_000;

export interface ClientOptions {
    consignorId: string | number;
    consignorKey: string;
    currency?: string;          // default SEK
    language?: string;          // ISO 639-1, default sv
    environment?: Environment;  // default production
    baseUrls?: Partial<Record<Environment, string>>;
    timeoutMs?: number;
    debug?: boolean;            // log documents and raw replies
    logger?: Logger;
    transport?: Transport;
}

/**
 * One session against the Fraktjakt API. Parcels and commodities accumulate on
 * the session and are never cleared; use a new client per independent request.
 * Not safe to share between concurrent callers.
 */
export class FraktjaktClient {
    readonly environment: Environment;
    readonly baseUrl: string;

    private consignor: Consignor;
    private transport: Transport;
    private logger: Logger;
    private debug: boolean;
    private parcelList: Readonly<Parcel>[] = [];
    private commodityList: Readonly<Commodity>[] = [];

    constructor(options: ClientOptions) {
        validateOptions('base', clientOptionsSchema, options);
        this.consignor = {
            consignorId: options.consignorId,
            consignorKey: options.consignorKey,
            currency: options.currency || 'SEK',
            language: options.language || 'sv',
        };
        this.environment = options.environment ?? Environment.Production;
        this.baseUrl = options.baseUrls?.[this.environment] ?? DEFAULT_BASE_URLS[this.environment];
        this.debug = options.debug ?? false;
        this.logger = options.logger ?? createConsoleLogger({ debug: this.debug });
        this.transport = options.transport ?? new HttpClient('fraktjakt', {
            baseURL: this.baseUrl,
            timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            logger: this.logger,
        });
    }

    get parcels(): readonly Readonly<Parcel>[] {
        return [...this.parcelList];
    }

    get commodities(): readonly Readonly<Commodity>[] {
        return [...this.commodityList];
    }

    addParcel(parcel: Parcel): void {
        validateOptions('parcel', parcelSchema, parcel);
        this.parcelList.push(Object.freeze({ ...parcel }));
    }

    addCommodity(commodity: Commodity): void {
        validateOptions('commodity', commoditySchema, commodity);
        this.commodityList.push(Object.freeze({ ...commodity }));
    }

    /**
     * Asks for prices on the session's parcels. Every offered shipping product
     * becomes a SearchResult; the shipment id is needed to place an order.
     */
    async quote(options: QuoteOptions): Promise<QuoteResult> {
        if (!options?.address) {
            throw new MissingInformationError('You have not entered address', { missing: ['address'] });
        }
        checkRequiredOptions('address', options.address);
        if (options.addressFrom) {
            checkRequiredOptions('address', options.addressFrom);
        }
        validateOptions(null, quoteOptionsSchema, options);

        const document = buildShipmentDocument(this.consignor, options, this.parcelList);
        const body = await this.send(ENDPOINTS.quote, document);
        return interpretQuoteReply(body, this.logger);
    }

    /**
     * Books a shipping product from an earlier quote. Reusing a shipment id
     * makes the service copy the shipment under a new id.
     */
    async order(options: OrderOptions): Promise<OrderResult> {
        checkRequiredOptions('order', options);
        const { recipient } = options;
        if (isBlank(recipient.name) && isBlank(recipient.company)) {
            throw new MissingInformationError(
                'You have not entered name or company for the recipient',
                { missing: ['recipient.name'] },
            );
        }
        if (isBlank(recipient.telephone) && isBlank(recipient.mobile) && isBlank(recipient.email)) {
            throw new MissingInformationError(
                'You have not entered a contact method for the recipient. Add at least a telephone number.',
                { missing: ['recipient.telephone'] },
            );
        }
        validateOptions(null, orderOptionsSchema, options);

        const document = buildOrderDocument(this.consignor, options, this.commodityList);
        const body = await this.send(ENDPOINTS.order, document);
        return interpretOrderReply(body, this.logger);
    }

    /**
     * Tracks a booked shipment. Use the id returned by order; the service may
     * have split it, so several results can come back.
     */
    async track(options: TrackOptions): Promise<TrackResponse> {
        validateOptions('track', trackOptionsSchema, options);
        const body = await this.fetch(`${ENDPOINTS.track}/${toInteger(options.shipmentId)}`);
        return interpretTrackReply(body, this.logger);
    }

    private async send(endpoint: string, document: RequestDocument): Promise<RawBody> {
        const xml = serializeDocument(document);
        if (this.debug) {
            this.logger.debug('Sending document', { endpoint, xml });
        }
        return this.fetch(`${endpoint}?xml=${encodeDocument(xml)}`);
    }

    private async fetch(url: string): Promise<RawBody> {
        const response = await this.transport.get<RawBody>(url, { responseType: 'arraybuffer' });
        if (!isAcceptedStatus(response.status)) {
            throw new TransportError(response.status);
        }
        if (this.debug) {
            this.logger.debug('Received reply', { status: response.status, body: truncate(decodeBody(response.data)) });
        }
        return response.data;
    }
}

function isBlank(value: string | undefined): boolean {
    return value === undefined || value === null || value.trim() === '';
}
