import { z } from 'zod';

// fast-xml-parser yields '' for empty elements, arrays for repeated ones and
// { '#text': ... } for text mixed with child elements.

export function textOf(node: unknown): string | undefined {
    if (Array.isArray(node)) return textOf(node[0]);
    if (typeof node === 'string') return node === '' ? undefined : node;
    if (typeof node === 'number' || typeof node === 'boolean') return String(node);
    if (typeof node === 'object' && node !== null && '#text' in node) return textOf(node['#text']);
    return undefined;
}

export function elementOf(node: unknown): unknown {
    if (Array.isArray(node)) return elementOf(node[0]);
    return node === '' ? {} : node;
}

/** The `tag` children of a collection node, in reply order. Other children are ignored. */
export function entriesOf(node: unknown, tag: string): unknown[] | undefined {
    const element = elementOf(node);
    if (typeof element !== 'object' || element === null) return undefined;
    const entries = new Map<string, unknown>(Object.entries(element)).get(tag);
    if (entries === undefined) return undefined;
    return Array.isArray(entries) ? entries : [entries];
}

function text(missing: string) {
    return z.preprocess(textOf, z.string({ required_error: missing, invalid_type_error: missing }));
}

function optionalText() {
    return z.preprocess(textOf, z.string().optional());
}

function numberFrom(parse: (value: string) => number) {
    return (value: string, ctx: z.RefinementCtx): number => {
        const parsed = parse(value);
        if (Number.isNaN(parsed)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `Fraktjakt replied with "${value}" where a number was expected.`,
            });
            return z.NEVER;
        }
        return parsed;
    };
}

const parseInteger = (value: string) => parseInt(value, 10);

function integer(missing: string) {
    return text(missing).transform(numberFrom(parseInteger));
}

function float(missing: string) {
    return text(missing).transform(numberFrom(parseFloat));
}

function element<T extends z.ZodRawShape>(shape: T, missing: string) {
    return z.preprocess(elementOf, z.object(shape, { required_error: missing, invalid_type_error: missing }));
}

/** A mandatory collection: absent or empty both fail with the same message. */
function collection<T extends z.ZodTypeAny>(tag: string, entry: T, missing: string) {
    return z.preprocess(
        node => entriesOf(node, tag),
        z.array(entry, { required_error: missing, invalid_type_error: missing }).min(1, missing),
    );
}

export function replyRoot(missing: string) {
    return z.preprocess(
        elementOf,
        z.record(z.string(), z.unknown(), { required_error: missing, invalid_type_error: missing }),
    );
}

export function statusSchema(codeMandatory: boolean, fallbackMessage: string) {
    return z.object({
        code: codeMandatory
            ? integer(fallbackMessage)
            : z.preprocess(textOf, z.string().optional()).transform(value => (value === undefined ? 0 : parseInteger(value))),
        error_message: optionalText(),
        warning_message: optionalText(),
    });
}

const shippingProductSchema = element({
    id: integer('ID is missing for the result.'),
    description: text('Name is missing for the result.'),
    arrival_time: optionalText(),
    price: float('Price is missing for the result.'),
    tax_class: integer('VAT class is missing for the result.'),
    agent_info: optionalText(),
    agent_link: optionalText(),
    agent_in_info: optionalText(),
    agent_in_link: optionalText(),
}, 'A shipping product in the reply is empty.');

export const quoteReplySchema = z.object({
    id: integer('The shipment has no id.'),
    shipping_products: collection('shipping_product', shippingProductSchema, 'No shipping products match a shipment like this.'),
});

export const orderReplySchema = z.object({
    shipment_id: integer('Fraktjakt cannot fetch the current shipment at the moment.'),
    order_id: integer('No order was created in Fraktjakt.'),
    sender_email_link: optionalText(),
});

const shippingStateSchema = element({
    shipment_id: integer('Fraktjakt cannot fetch the current status at the moment.'),
    name: text('The status name is missing in Fraktjakt.'),
    id: integer('The status id is missing in Fraktjakt.'),
    fraktjakt_id: integer('The internal status id is missing in Fraktjakt.'),
}, 'A shipping state in the reply is empty.');

export const trackReplySchema = z.object({
    shipping_states: collection('shipping_state', shippingStateSchema, 'The tracking query gave no result.'),
});

export type QuoteReply = z.output<typeof quoteReplySchema>;
export type OrderReply = z.output<typeof orderReplySchema>;
export type TrackReply = z.output<typeof trackReplySchema>;
