export enum Environment {
    Test = 'test',
    Production = 'production',
}

export enum QuantityUnit {
    Each = 'EA',
    Dozen = 'DZ',
    Litre = 'L',
    Millilitre = 'ML',
    Kilogram = 'KG',
}

export enum ShippingStatus {
    HandledBySender = 0,
    Sent = 1,
    Delivered = 2,
    Signed = 3,
    Returned = 4,
}

// numbers or numeric strings; each field coerces to integer or float on the wire
export type Numeric = number | string;

export interface Parcel {
    weight: Numeric;       // kg
    length: Numeric;       // cm, rendered as 1 when below 1
    width: Numeric;
    height: Numeric;
}

export interface Commodity {
    name: string;                  // in a language understood in the receiver's country
    quantity: Numeric;
    quantityUnits?: QuantityUnit | `${QuantityUnit}`;
    taric?: string;                // customs tariff code, speeds up international shipments
    description?: string;
    countryOfManufacture?: string; // ISO 3166-1 alpha-2, defaults to SE
    unitPrice?: Numeric;
    weight?: Numeric;
}

export interface Address {
    street1: string;
    street2?: string;
    postalCode?: string;
    cityName: string;
    countrySubdivisionCode?: string;   // only US, Canada and their territories
    countryCode?: string;              // ISO 3166-1 alpha-2, defaults to SE
    residential?: boolean;             // defaults to true
}

export interface Recipient {
    company?: string;
    name?: string;
    telephone?: string;
    mobile?: string;
    email?: string;
}

/** Free-form booking details, passed to the service verbatim. */
export interface Booking {
    drivingInstruction?: string;
    userNotes?: string;
    pickupDate?: string;   // YYYY-MM-DD, a future working day
    readyTime?: string;    // HH:MM
    closeTime?: string;    // HH:MM
}

export interface QuoteOptions {
    express?: boolean;
    pickup?: boolean;
    dropoff?: boolean;
    green?: boolean;
    quality?: boolean;
    timeGuarantee?: boolean;
    cold?: boolean;
    frozen?: boolean;
    noAgents?: boolean;
    noPrice?: boolean;
    agentsIn?: boolean;
    shippingProductId?: Numeric;
    value?: Numeric;           // floored to 1.0
    referrerCode?: string;
    address: Address;
    addressFrom?: Address;
}

export interface OrderOptions {
    shipmentId?: Numeric;
    shippingProductId: Numeric;
    value?: Numeric;
    senderEmail?: string;
    reference?: string;        // shows up on the shipping labels
    recipient: Recipient;
    booking?: Booking;
}

export interface TrackOptions {
    shipmentId: Numeric;
}

export interface SearchResult {
    readonly id: number;
    readonly description: string;
    readonly arrivalTime?: string;
    readonly price: number;
    readonly taxClass: number;
    readonly agentInfo?: string;      // pickup agent closest to the receiver
    readonly agentLink?: string;
    readonly agentInInfo?: string;    // drop-off agent closest to the sender
    readonly agentInLink?: string;
    readonly shipmentId: number;
}

export interface TrackResult {
    readonly shipmentId: number;      // can differ from the queried id when the shipment was split
    readonly name: string;
    readonly statusId: number;
    readonly fraktjaktStatusId: number;
}

export interface QuoteResult {
    shipmentId: number;
    warning?: string;
    results: SearchResult[];
}

export interface OrderResult {
    warning?: string;
    shipmentId: number;
    orderId: number;
    senderEmailLink?: string;
}

export interface TrackResponse {
    warning?: string;
    results: TrackResult[];
}
