export { Environment, QuantityUnit, ShippingStatus } from './models';
export type {
    Numeric,
    Parcel,
    Commodity,
    Address,
    Recipient,
    Booking,
    QuoteOptions,
    OrderOptions,
    TrackOptions,
    SearchResult,
    TrackResult,
    QuoteResult,
    OrderResult,
    TrackResponse,
} from './models';

export {
    parcelSchema,
    commoditySchema,
    addressSchema,
    quoteRequestSchema,
    orderRequestSchema,
    trackOptionsSchema,
} from './schemas';
export type { QuoteRequest, OrderRequest, TrackRequest } from './schemas';

export { REQUIRED_OPTIONS, checkRequiredOptions } from './validation';

export {
    FraktjaktError,
    TransportError,
    ParseError,
    MissingInformationError,
    CONNECTIVITY_MESSAGE,
} from './errors';
export type { ErrorCode } from './errors';
