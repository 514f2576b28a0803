import {
    decodeBody,
    interpretOrderReply,
    interpretQuoteReply,
    interpretTrackReply,
} from '../../src/carriers/fraktjakt/interpreter';
import { entriesOf } from '../../src/carriers/fraktjakt/reply-schemas';
import { FraktjaktError, ParseError } from '../../src/domain/errors';
import { createMockLogger, loadFixture } from '../helpers';

describe('Fraktjakt reply interpreter', () => {

    describe('quote replies', () => {
        it('should turn every shipping product into a search result', () => {
            const result = interpretQuoteReply(loadFixture('quote-success.xml'));

            expect(result.shipmentId).toBe(4711);
            expect(result.warning).toBeUndefined();
            expect(result.results.map(r => r.id)).toEqual([10, 12, 14]);
            expect(result.results[0]).toEqual({
                id: 10,
                description: 'Standard',
                arrivalTime: '1-2 dagar',
                price: 49.5,
                taxClass: 25,
                agentInfo: 'Ombud Centrum',
                agentLink: 'http://example.com/agents/1',
                shipmentId: 4711,
            });
            expect(Object.isFrozen(result.results[0])).toBe(true);
        });

        it('should pass the warning message through on code 1', () => {
            const result = interpretQuoteReply(loadFixture('quote-warning.xml'));

            expect(result.warning).toBe('Leveransen kan ta längre tid än vanligt.');
            expect(result.shipmentId).toBe(4712);
            expect(result.results).toHaveLength(1);
        });

        it('should raise the service error message on code 2', () => {
            const body = loadFixture('quote-error.xml');

            expect(() => interpretQuoteReply(body)).toThrow(FraktjaktError);
            expect(() => interpretQuoteReply(body)).toThrow('Fel nyckel för avsändaren.');
            try {
                interpretQuoteReply(body);
            } catch (err) {
                expect(err).not.toBeInstanceOf(ParseError);
                expect(err).toHaveProperty('code', 'SERVICE_ERROR');
            }
        });

        it('should fall back to a generic message when code 2 has no error text', () => {
            const body = '<shipment><code>2</code><error_message></error_message></shipment>';

            expect(() => interpretQuoteReply(body)).toThrow('Prices cannot be fetched.');
        });

        it('should fail when no shipping products come back', () => {
            expect(() => interpretQuoteReply(loadFixture('quote-no-products.xml')))
                .toThrow(new ParseError('No shipping products match a shipment like this.'));
        });

        it('should fail when the root element is missing', () => {
            expect(() => interpretQuoteReply('<?xml version="1.0"?><html><body>Maintenance</body></html>'))
                .toThrow('Prices from Fraktjakt cannot be fetched at the moment.');
        });

        it('should fail when the status code is missing', () => {
            expect(() => interpretQuoteReply('<shipment><id>1</id></shipment>'))
                .toThrow('Prices cannot be fetched.');
        });

        it('should fail on a product without a price', () => {
            const body = '<shipment><code>0</code><id>5</id><shipping_products>' +
                '<shipping_product><id>10</id><description>Standard</description><tax_class>25</tax_class></shipping_product>' +
                '</shipping_products></shipment>';

            expect(() => interpretQuoteReply(body)).toThrow('Price is missing for the result.');
        });

        it('should fail on a non-numeric price', () => {
            const body = '<shipment><code>0</code><id>5</id><shipping_products>' +
                '<shipping_product><id>10</id><description>Standard</description><price>gratis</price><tax_class>25</tax_class></shipping_product>' +
                '</shipping_products></shipment>';

            expect(() => interpretQuoteReply(body))
                .toThrow('Fraktjakt replied with "gratis" where a number was expected.');
        });

        it('should reject a body that is not XML', () => {
            expect(() => interpretQuoteReply('<shipment><code>0</shipment>')).toThrow(ParseError);
            expect(() => interpretQuoteReply('<shipment><code>0</shipment>')).toThrow(/^The reply from Fraktjakt is not valid XML/);
        });

        it('should read only shipping products from the collection, in reply order', () => {
            const body = '<shipment><code>0</code><id>5</id><shipping_products>' +
                '<shipping_product><id>10</id><description>Standard</description><price>49</price><tax_class>25</tax_class></shipping_product>' +
                '<summary>2 products</summary>' +
                '<shipping_product><id>12</id><description>Express</description><price>129</price><tax_class>25</tax_class></shipping_product>' +
                '</shipping_products></shipment>';

            expect(interpretQuoteReply(body).results.map(r => r.id)).toEqual([10, 12]);
        });

        it('should log unknown status codes and carry on', () => {
            const logger = createMockLogger();
            const body = '<shipment><code>7</code><id>5</id><shipping_products>' +
                '<shipping_product><id>10</id><description>Standard</description><price>10</price><tax_class>25</tax_class></shipping_product>' +
                '</shipping_products></shipment>';

            const result = interpretQuoteReply(body, logger);

            expect(result.results).toHaveLength(1);
            expect(logger.warn).toHaveBeenCalledWith('Unrecognized reply code 7, treating it as success');
        });
    });

    describe('order replies', () => {
        it('should return the shipment and order ids', () => {
            expect(interpretOrderReply(loadFixture('order-success.xml'))).toEqual({
                shipmentId: 4711,
                orderId: 9001,
                senderEmailLink: 'http://example.com/orders/9001',
            });
        });

        it('should pass the warning message through on code 1', () => {
            expect(interpretOrderReply(loadFixture('order-warning.xml'))).toEqual({
                warning: 'Upphämtningen kunde inte bokas, lämna paketet hos ett ombud.',
                shipmentId: 4715,
                orderId: 9002,
            });
        });

        it('should fail when no order id came back', () => {
            const body = '<result><code>0</code><shipment_id>4711</shipment_id></result>';

            expect(() => interpretOrderReply(body)).toThrow('No order was created in Fraktjakt.');
        });

        it('should fail when the result element is missing', () => {
            expect(() => interpretOrderReply('<shipment><code>0</code></shipment>'))
                .toThrow('Fraktjakt cannot create an order.');
        });
    });

    describe('track replies', () => {
        it('should return one result per shipping state', () => {
            const response = interpretTrackReply(loadFixture('track-success.xml'));

            expect(response.warning).toBeUndefined();
            expect(response.results).toEqual([
                { shipmentId: 4711, name: 'Skickad', statusId: 1, fraktjaktStatusId: 1 },
                { shipmentId: 4714, name: 'Levererad', statusId: 2, fraktjaktStatusId: 2 },
            ]);
        });

        it('should treat a missing status code as success', () => {
            const body = '<result><shipping_states><shipping_state>' +
                '<shipment_id>4711</shipment_id><name>Skickad</name><id>1</id><fraktjakt_id>1</fraktjakt_id>' +
                '</shipping_state></shipping_states></result>';

            expect(interpretTrackReply(body).results).toHaveLength(1);
        });

        it('should fail on an empty tracking result', () => {
            expect(() => interpretTrackReply('<result><code>0</code><shipping_states/></result>'))
                .toThrow('The tracking query gave no result.');
        });
    });

    describe('decodeBody', () => {
        it('should decode bytes declared as ISO-8859-1', () => {
            const bytes = Buffer.from('<?xml version="1.0" encoding="ISO-8859-1"?><result>Försenad</result>', 'latin1');

            expect(decodeBody(bytes)).toBe('<?xml version="1.0" encoding="ISO-8859-1"?><result>Försenad</result>');
        });

        it('should decode undeclared bytes as UTF-8 and drop a byte order mark', () => {
            const bytes = Buffer.from('\uFEFF<result>Försenad</result>', 'utf8');

            expect(decodeBody(bytes)).toBe('<result>Försenad</result>');
        });

        it('should read a Latin-1 warning message through the interpreter', () => {
            const bytes = Buffer.from(
                '<?xml version="1.0" encoding="iso-8859-1"?><result><code>1</code>' +
                '<warning_message>Försändelsen är försenad</warning_message>' +
                '<shipping_states><shipping_state><shipment_id>4711</shipment_id><name>Skickad</name><id>1</id><fraktjakt_id>1</fraktjakt_id></shipping_state></shipping_states>' +
                '</result>',
                'latin1',
            );

            expect(interpretTrackReply(bytes).warning).toBe('Försändelsen är försenad');
        });
    });

    describe('entriesOf', () => {
        it('should pick the entries of one tag', () => {
            expect(entriesOf({ a: ['1', '3'], b: '2' }, 'a')).toEqual(['1', '3']);
            expect(entriesOf({ a: '1', b: '2' }, 'a')).toEqual(['1']);
        });

        it('should return nothing for an empty or foreign collection', () => {
            expect(entriesOf('', 'a')).toBeUndefined();
            expect(entriesOf({ b: '2' }, 'a')).toBeUndefined();
        });
    });
});
