// Request document tree. Optional tags left undefined are not serialized.

export type BooleanText = 'true' | 'false';

export interface ConsignorBlock {
    id: string;
    key: string;
    currency: string;
    language: string;
}

export interface ParcelBlock {
    weight: string;
    length: string;
    width: string;
    height: string;
}

export interface CommodityBlock {
    name: string;
    quantity: string;
    taric?: string;
    quantity_units: string;
    description?: string;
    country_of_manufacture: string;
    weight?: string;
    unit_price?: string;
}

export interface AddressBlock {
    street_address_1: string;
    street_address_2?: string;
    postal_code?: string;
    city_name: string;
    country_code: string;
    country_subdivision_code?: string;
    residential: BooleanText;
}

export interface RecipientBlock {
    company_to?: string;
    name_to?: string;
    telephone_to?: string;
    mobile_to?: string;
    email_to?: string;
}

export interface BookingBlock {
    driving_instruction?: string;
    user_notes?: string;
    pickup_date?: string;
    ready_time?: string;
    close_time?: string;
}

export interface ShipmentDocument {
    consignor: ConsignorBlock;
    express?: BooleanText;
    pickup?: BooleanText;
    dropoff?: BooleanText;
    green?: BooleanText;
    quality?: BooleanText;
    time_guarantie?: BooleanText;     // sic, the service's spelling
    cold?: BooleanText;
    frozen?: BooleanText;
    no_agents?: BooleanText;
    no_price?: BooleanText;
    agents_in?: BooleanText;
    shipping_product_id?: string;
    value: string;
    referrer_code?: string;
    parcels: { parcel: ParcelBlock[] };
    address_from?: AddressBlock;
    address_to: AddressBlock;
}

export interface OrderDocument {
    consignor: ConsignorBlock;
    shipment_id?: string;
    shipping_product_id?: string;
    value: string;
    sender_email?: string;
    reference?: string;
    recipient: RecipientBlock;
    commodities: { commodity: CommodityBlock[] };
    booking?: BookingBlock;
}

export type RequestDocument =
    | { shipment: ShipmentDocument }
    | { order: OrderDocument };

export type RawBody = ArrayBuffer | Uint8Array | string;
