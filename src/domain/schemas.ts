import { z } from 'zod';
import { Environment, QuantityUnit } from './models';

const numeric = z.union([
    z.number().finite(),
    z.string(),
], { errorMap: () => ({ message: 'Expected a number or a numeric string' }) });

// blank units fall back to EA, like an absent value
const quantityUnits = z.preprocess(
    value => (value === '' ? undefined : value),
    z.nativeEnum(QuantityUnit, {
        errorMap: () => ({ message: 'Wrong type of quantity_units, expected one of EA, DZ, L, ML, KG' }),
    }).optional(),
);

export const parcelSchema = z.object({
    weight: numeric,
    length: numeric,
    width: numeric,
    height: numeric,
}).strict();

export const commoditySchema = z.object({
    name: z.string().min(1, 'Commodity name is required'),
    quantity: numeric,
    quantityUnits,
    taric: z.string().optional(),
    description: z.string().optional(),
    countryOfManufacture: z.string().optional(),
    unitPrice: numeric.optional(),
    weight: numeric.optional(),
}).strict();

export const addressSchema = z.object({
    street1: z.string(),
    street2: z.string().optional(),
    postalCode: z.string().max(20, 'Postal code seems too long').optional(),
    cityName: z.string(),
    countrySubdivisionCode: z.string().optional(),
    countryCode: z.string()
        .length(2, 'Country code must be 2-letter ISO format')
        .optional(),
    residential: z.boolean().optional(),
}).strict();

export const recipientSchema = z.object({
    company: z.string().optional(),
    name: z.string().optional(),
    telephone: z.string().optional(),
    mobile: z.string().optional(),
    email: z.string().optional(),
}).strict();

export const bookingSchema = z.object({
    drivingInstruction: z.string().optional(),
    userNotes: z.string().optional(),
    pickupDate: z.string().optional(),
    readyTime: z.string().optional(),
    closeTime: z.string().optional(),
}).strict();

export const quoteOptionsSchema = z.object({
    express: z.boolean().optional(),
    pickup: z.boolean().optional(),
    dropoff: z.boolean().optional(),
    green: z.boolean().optional(),
    quality: z.boolean().optional(),
    timeGuarantee: z.boolean().optional(),
    cold: z.boolean().optional(),
    frozen: z.boolean().optional(),
    noAgents: z.boolean().optional(),
    noPrice: z.boolean().optional(),
    agentsIn: z.boolean().optional(),
    shippingProductId: numeric.optional(),
    value: numeric.optional(),
    referrerCode: z.string().optional(),
    address: addressSchema,
    addressFrom: addressSchema.optional(),
}).strict();

export const orderOptionsSchema = z.object({
    shipmentId: numeric.optional(),
    shippingProductId: numeric,
    value: numeric.optional(),
    senderEmail: z.string().optional(),
    reference: z.string().optional(),
    recipient: recipientSchema,
    booking: bookingSchema.optional(),
}).strict();

export const trackOptionsSchema = z.object({
    shipmentId: numeric,
}).strict();

// logger and baseUrls are not data and pass through unchecked
export const clientOptionsSchema = z.object({
    consignorId: z.union([z.string().min(1), z.number().int()]),
    consignorKey: z.string().min(1, 'Consignor key is required'),
    currency: z.string().length(3, 'Currency must be a 3-letter ISO code').optional(),
    language: z.string().length(2, 'Language must be ISO 639-1').optional(),
    environment: z.nativeEnum(Environment).optional(),
    timeoutMs: z.number().int().positive().optional(),
    debug: z.boolean().optional(),
}).passthrough();

export const quoteRequestSchema = quoteOptionsSchema.extend({
    parcels: z.array(parcelSchema)
        .min(1, 'At least one parcel is required'),
}).strict();

export const orderRequestSchema = orderOptionsSchema.extend({
    commodities: z.array(commoditySchema)
        .min(1, 'At least one commodity is required'),
}).strict();

export type QuoteRequest = z.infer<typeof quoteRequestSchema>;
export type OrderRequest = z.infer<typeof orderRequestSchema>;
export type TrackRequest = z.infer<typeof trackOptionsSchema>;
