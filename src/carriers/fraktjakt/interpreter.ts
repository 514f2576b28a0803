import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import { FraktjaktError, ParseError } from '../../domain/errors';
import { OrderResult, QuoteResult, SearchResult, TrackResponse, TrackResult } from '../../domain/models';
import { Logger } from '../../logging/logger';
import {
    orderReplySchema,
    quoteReplySchema,
    replyRoot,
    statusSchema,
    trackReplySchema,
} from './reply-schemas';
import { ReplyCode, isKnownReplyCode } from './status-codes';
import { RawBody } from './types';

const xmlParser = new XMLParser({
    ignoreAttributes: true,
    ignoreDeclaration: true,
    parseTagValue: false,
    trimValues: true,
});

interface ReplyShape {
    root: 'shipment' | 'result';
    rootMissing: string;
    codeMandatory: boolean;
    statusMissing: string;
}

const QUOTE_REPLY: ReplyShape = {
    root: 'shipment',
    rootMissing: 'Prices from Fraktjakt cannot be fetched at the moment.',
    codeMandatory: true,
    statusMissing: 'Prices cannot be fetched.',
};

const ORDER_REPLY: ReplyShape = {
    root: 'result',
    rootMissing: 'Fraktjakt cannot create an order.',
    codeMandatory: true,
    statusMissing: 'The order cannot be created.',
};

const TRACK_REPLY: ReplyShape = {
    root: 'result',
    rootMissing: 'Fraktjakt cannot run a tracking query.',
    codeMandatory: false,
    statusMissing: 'Tracking information cannot be fetched.',
};

export interface Interpreted<T> {
    warning?: string;
    reply: T;
}

export function interpretQuoteReply(body: RawBody, logger?: Logger): QuoteResult {
    const { warning, reply } = interpret(body, QUOTE_REPLY, quoteReplySchema, logger);
    const shipmentId = reply.id;
    const results = reply.shipping_products.map((product): SearchResult => Object.freeze({
        id: product.id,
        description: product.description,
        arrivalTime: product.arrival_time,
        price: product.price,
        taxClass: product.tax_class,
        agentInfo: product.agent_info,
        agentLink: product.agent_link,
        agentInInfo: product.agent_in_info,
        agentInLink: product.agent_in_link,
        shipmentId,
    }));
    return { shipmentId, warning, results };
}

export function interpretOrderReply(body: RawBody, logger?: Logger): OrderResult {
    const { warning, reply } = interpret(body, ORDER_REPLY, orderReplySchema, logger);
    return {
        warning,
        shipmentId: reply.shipment_id,
        orderId: reply.order_id,
        senderEmailLink: reply.sender_email_link,
    };
}

export function interpretTrackReply(body: RawBody, logger?: Logger): TrackResponse {
    const { warning, reply } = interpret(body, TRACK_REPLY, trackReplySchema, logger);
    const results = reply.shipping_states.map((state): TrackResult => Object.freeze({
        shipmentId: state.shipment_id,
        name: state.name,
        statusId: state.id,
        fraktjaktStatusId: state.fraktjakt_id,
    }));
    return { warning, results };
}

/**
 * Parses the reply, raises on a code-2 failure and extracts the payload.
 * The payload is only looked at once the status code allows it.
 */
function interpret<S extends z.ZodTypeAny>(
    body: RawBody,
    shape: ReplyShape,
    payloadSchema: S,
    logger?: Logger,
): Interpreted<z.output<S>> {
    const tree = parseXml(decodeBody(body));
    const rootSchema = z.object({ [shape.root]: replyRoot(shape.rootMissing) });
    const root = extract(rootSchema, tree)[shape.root];

    const status = extract(statusSchema(shape.codeMandatory, shape.statusMissing), root);
    let warning: string | undefined;

    if (status.code === ReplyCode.Failure) {
        throw new FraktjaktError({
            message: status.error_message ?? shape.statusMissing,
            code: 'SERVICE_ERROR',
        });
    }
    if (status.code === ReplyCode.Warning) {
        warning = status.warning_message;
    } else if (!isKnownReplyCode(status.code)) {
        logger?.warn(`Unrecognized reply code ${status.code}, treating it as success`);
    }

    return { warning, reply: extract(payloadSchema, root) };
}

/** Runs a reply schema and turns its first issue into a ParseError. */
export function extract<S extends z.ZodTypeAny>(schema: S, node: unknown): z.output<S> {
    const result = schema.safeParse(node);
    if (!result.success) {
        const [first] = result.error.issues;
        throw new ParseError(first?.message ?? 'Unexpected reply from Fraktjakt.', result.error);
    }
    return result.data;
}

export function parseXml(text: string): unknown {
    const validation = XMLValidator.validate(text);
    if (validation !== true) {
        throw new ParseError(
            `The reply from Fraktjakt is not valid XML (line ${validation.err.line}: ${validation.err.msg}).`,
        );
    }
    const tree: unknown = xmlParser.parse(text);
    return tree;
}

const LATIN1_LABELS = new Set(['iso-8859-1', 'iso8859-1', 'latin1', 'latin-1', 'us-ascii', 'ascii']);

/** Decodes the body with the encoding its XML declaration names, UTF-8 otherwise. */
export function decodeBody(body: RawBody): string {
    if (typeof body === 'string') return body;
    const bytes = body instanceof ArrayBuffer ? Buffer.from(body) : Buffer.from(body);
    const head = bytes.subarray(0, 200).toString('latin1');
    const declared = /<\?xml[^>]*encoding=["']([^"']+)["']/i.exec(head)?.[1]?.toLowerCase();
    const text = declared && LATIN1_LABELS.has(declared)
        ? bytes.toString('latin1')
        : bytes.toString('utf8');
    return text.replace(/^\uFEFF/, '');
}
