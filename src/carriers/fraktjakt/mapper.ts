import { XMLBuilder } from 'fast-xml-parser';
import {
    Address,
    Booking,
    Commodity,
    Numeric,
    OrderOptions,
    Parcel,
    QuantityUnit,
    QuoteOptions,
    Recipient,
} from '../../domain/models';
import { MissingInformationError } from '../../domain/errors';
import {
    AddressBlock,
    BooleanText,
    BookingBlock,
    CommodityBlock,
    ConsignorBlock,
    OrderDocument,
    ParcelBlock,
    RecipientBlock,
    RequestDocument,
    ShipmentDocument,
} from './types';

export const XML_DECLARATION = '<?xml version="1.0" encoding="iso-8859-1"?>';

export interface Consignor {
    consignorId: string | number;
    consignorKey: string;
    currency: string;
    language: string;
}

const xmlBuilder = new XMLBuilder({
    format: false,
    suppressEmptyNode: false,
});

export function buildShipmentDocument(
    consignor: Consignor,
    options: QuoteOptions,
    parcels: readonly Parcel[],
): { shipment: ShipmentDocument } {
    if (parcels.length === 0) {
        throw new MissingInformationError(
            'You need to add at least one parcel with addParcel before asking for a quote',
            { missing: ['parcels'] },
        );
    }
    return {
        shipment: {
            consignor: mapConsignor(consignor),
            express: booleanText(options.express),
            pickup: booleanText(options.pickup),
            dropoff: booleanText(options.dropoff),
            green: booleanText(options.green),
            quality: booleanText(options.quality),
            time_guarantie: booleanText(options.timeGuarantee),
            cold: booleanText(options.cold),
            frozen: booleanText(options.frozen),
            no_agents: booleanText(options.noAgents),
            no_price: booleanText(options.noPrice),
            agents_in: booleanText(options.agentsIn),
            shipping_product_id: integerText(options.shippingProductId),
            value: declaredValueText(options.value),
            referrer_code: stringText(options.referrerCode),
            parcels: { parcel: parcels.map(mapParcel) },
            address_from: options.addressFrom ? mapAddress(options.addressFrom) : undefined,
            address_to: mapAddress(options.address),
        },
    };
}

export function buildOrderDocument(
    consignor: Consignor,
    options: OrderOptions,
    commodities: readonly Commodity[],
): { order: OrderDocument } {
    if (commodities.length === 0) {
        throw new MissingInformationError(
            'You need to add at least one commodity with addCommodity before placing an order',
            { missing: ['commodities'] },
        );
    }
    return {
        order: {
            consignor: mapConsignor(consignor),
            shipment_id: integerText(options.shipmentId),
            shipping_product_id: integerText(options.shippingProductId),
            value: declaredValueText(options.value),
            sender_email: stringText(options.senderEmail),
            reference: stringText(options.reference),
            recipient: mapRecipient(options.recipient),
            commodities: { commodity: commodities.map(mapCommodity) },
            booking: options.booking ? mapBooking(options.booking) : undefined,
        },
    };
}

export function serializeDocument(document: RequestDocument): string {
    return XML_DECLARATION + xmlBuilder.build(document);
}

/**
 * Percent-encodes the document as ISO-8859-1 bytes, matching the encoding the
 * XML declaration announces. Characters outside Latin-1 travel as numeric
 * character references.
 */
export function encodeDocument(xml: string): string {
    let encoded = '';
    for (const byte of Buffer.from(toCharacterReferences(xml), 'latin1')) {
        encoded += isUnreserved(byte)
            ? String.fromCharCode(byte)
            : `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
    return encoded;
}

export function toCharacterReferences(xml: string): string {
    let result = '';
    for (const char of xml) {
        const codePoint = char.codePointAt(0) ?? 0;
        result += codePoint > 0xff ? `&#x${codePoint.toString(16).toUpperCase()};` : char;
    }
    return result;
}

function isUnreserved(byte: number): boolean {
    return (byte >= 0x30 && byte <= 0x39)       // 0-9
        || (byte >= 0x41 && byte <= 0x5a)       // A-Z
        || (byte >= 0x61 && byte <= 0x7a)       // a-z
        || byte === 0x2d || byte === 0x2e || byte === 0x5f || byte === 0x7e;   // - . _ ~
}

function mapConsignor(consignor: Consignor): ConsignorBlock {
    return {
        id: String(consignor.consignorId),
        key: consignor.consignorKey,
        currency: consignor.currency || 'SEK',
        language: consignor.language || 'sv',
    };
}

export function mapParcel(parcel: Parcel): ParcelBlock {
    return {
        weight: numericText(parcel.weight) ?? '1',
        length: dimensionText(parcel.length),
        width: dimensionText(parcel.width),
        height: dimensionText(parcel.height),
    };
}

export function mapCommodity(commodity: Commodity): CommodityBlock {
    return {
        name: commodity.name,
        quantity: commodity.quantity ? String(commodity.quantity) : '1',
        taric: stringText(commodity.taric),
        quantity_units: commodity.quantityUnits || QuantityUnit.Each,
        description: stringText(commodity.description),
        country_of_manufacture: stringText(commodity.countryOfManufacture) ?? 'SE',
        weight: numericText(commodity.weight),
        unit_price: numericText(commodity.unitPrice),
    };
}

export function mapAddress(address: Address): AddressBlock {
    return {
        street_address_1: address.street1 ?? '',
        street_address_2: stringText(address.street2),
        postal_code: stringText(address.postalCode),
        city_name: address.cityName ?? '',
        country_code: stringText(address.countryCode) ?? 'SE',
        country_subdivision_code: stringText(address.countrySubdivisionCode),
        residential: (address.residential ?? true) === true ? 'true' : 'false',
    };
}

function mapRecipient(recipient: Recipient): RecipientBlock {
    return {
        company_to: stringText(recipient.company),
        name_to: stringText(recipient.name),
        telephone_to: stringText(recipient.telephone),
        mobile_to: stringText(recipient.mobile),
        email_to: stringText(recipient.email),
    };
}

// a supplied booking is always sent, as <booking></booking> when every field is blank
function mapBooking(booking: Booking): BookingBlock {
    return {
        driving_instruction: stringText(booking.drivingInstruction),
        user_notes: stringText(booking.userNotes),
        pickup_date: stringText(booking.pickupDate),
        ready_time: stringText(booking.readyTime),
        close_time: stringText(booking.closeTime),
    };
}

// ---- coercion rules ----

export function toInteger(value: Numeric | undefined | null): number {
    if (value === undefined || value === null) return 0;
    const parsed = typeof value === 'number' ? Math.trunc(value) : parseInt(value.trim(), 10);
    return Number.isNaN(parsed) ? 0 : parsed;
}

export function toFloat(value: Numeric | undefined | null): number {
    if (value === undefined || value === null) return 0;
    const parsed = typeof value === 'number' ? value : parseFloat(value.trim());
    return Number.isNaN(parsed) ? 0 : parsed;
}

export function formatFloat(value: number): string {
    return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

function booleanText(value: unknown): BooleanText | undefined {
    if (value === true) return 'true';
    if (value === false) return 'false';
    return undefined;
}

function integerText(value: Numeric | undefined): string | undefined {
    const parsed = toInteger(value);
    return parsed === 0 ? undefined : String(parsed);
}

function stringText(value: string | undefined): string | undefined {
    return value === undefined || value === null || value.trim() === '' ? undefined : value;
}

// numbers pass through as written; blank strings count as absent
function numericText(value: Numeric | undefined): string | undefined {
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'number') return String(value);
    return stringText(value);
}

function dimensionText(value: Numeric | undefined): string {
    if (value === undefined || value === null || toFloat(value) < 1) return '1';
    return numericText(value) ?? '1';
}

// the service rejects shipments declared below 1.0
function declaredValueText(value: Numeric | undefined): string {
    const declared = toFloat(value);
    return formatFloat(declared < 1 ? 1 : declared);
}
