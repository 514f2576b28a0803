import { loadConfig, AppConfig } from './config';
import { ShippingService } from './services/shipping.service';
import { describeTrackResult } from './carriers/fraktjakt/status-codes';
import { FraktjaktError, MissingInformationError } from './domain/errors';

async function main() {
    console.log('=== Fraktjakt Client Demo ===\n');

    let config: AppConfig;
    try {
        config = loadConfig();
    } catch (err) {
        console.error('Config error:', err instanceof Error ? err.message : err);
        console.log('\nHint: copy .env.example to .env and fill in your consignor id and key.\n');
        process.exit(1);
    }
    console.log(`Environment: ${config.fraktjakt.environment} (${config.fraktjakt.baseUrls[config.fraktjakt.environment]})`);

    const shippingService = new ShippingService({ config });
    const sampleRequest = {
        address: {
            street1: 'Storgatan 1',
            postalCode: '11122',
            cityName: 'Stockholm',
            countryCode: 'SE',
        },
        parcels: [
            { weight: 2.5, length: 30, width: 20, height: 10 },
        ],
        value: 250,
    };

    console.log('\nSample quote request:');
    console.log(JSON.stringify(sampleRequest, null, 2));
    try {
        console.log('\nFetching prices from Fraktjakt...');
        const quote = await shippingService.getQuotes(sampleRequest);

        console.log(`\nShipment ${quote.shipmentId}, ${quote.results.length} shipping products:`);
        if (quote.warning) {
            console.log(`  Warning: ${quote.warning}`);
        }
        for (const result of quote.results) {
            console.log(
                `  [${result.id}] ${result.description}: ${result.price.toFixed(2)} ${config.fraktjakt.currency}` +
                (result.arrivalTime ? ` (${result.arrivalTime})` : '')
            );
        }
        console.log(`\nRequest ID: ${quote.requestId}`);

        // the demo places no order, so this id only has states once the shipment is ordered
        console.log(`\nTracking shipment ${quote.shipmentId} (real tracking uses the shipmentId returned by placeOrder):`);
        const tracking = await shippingService.trackShipment({ shipmentId: quote.shipmentId });
        for (const state of tracking.results) {
            console.log(`  ${describeTrackResult(state)}`);
        }
    } catch (err) {
        if (err instanceof FraktjaktError) {
            console.log(`\nFraktjakt error (expected without valid credentials):`);
            console.log(JSON.stringify(err.toJSON(), null, 2));
        } else {
            console.error('Unexpected error:', err);
        }
    }

    console.log('\n--- Validation Demo ---');
    try {
        await shippingService.getQuotes({
            address: { street1: 'Storgatan 1', cityName: 'Stockholm' },
            parcels: [],   // at least one parcel is required
        });
    } catch (err) {
        if (err instanceof MissingInformationError) {
            console.log('Validation correctly caught bad input:');
            console.log(JSON.stringify(err.toJSON(), null, 2));
        }
    }

    console.log('\nDone.');
}

main().catch(console.error);
