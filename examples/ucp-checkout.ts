/**
 * Example: UCP Checkout Flow
 *
 * Buys one item from a local UCP merchant: discover, create, apply a
 * discount, set up shipping, pay.
 *
 * Run against a merchant listening on UCP_MERCHANT_URL (default http://localhost:8182).
 */

import { UCPClient, loadConfig, withTransport } from '../src';

async function main() {
    const config = loadConfig();
    const merchantUrl = process.env.UCP_MERCHANT_URL ?? 'http://localhost:8182';

    await withTransport(merchantUrl, config.transport, async (transport) => {
        const client = new UCPClient(transport, config.checkout);

        const discovery = await client.discover();
        if (!discovery.ok) {
            console.error('Discovery failed:', discovery.error.message);
            return;
        }
        console.log(`Merchant speaks UCP ${discovery.value.ucpVersion}`);
        const handler = discovery.value.paymentHandlers[0];

        const created = await client.createCheckout({
            items: [{ id: 'bouquet_roses', quantity: 1 }],
            buyer: { name: 'Test Buyer', email: 'buyer@example.com' },
        });
        if (!created.ok) {
            console.error('Create failed:', created.error.message);
            return;
        }
        const checkoutId = created.value.id;
        console.log(`Checkout ${checkoutId}: total ${created.value.total()} ${created.value.currency}`);

        const discounted = await client.updateCheckout(checkoutId, { discountCodes: ['10OFF'] });
        if (discounted.ok) {
            console.log(`After discount: total ${discounted.value.total()} (saved ${discounted.value.discountAmount()})`);
        }

        const shipping = await client.negotiateFulfillment(checkoutId);
        if (!shipping.ok) {
            console.error('Fulfillment failed:', shipping.error.message);
            return;
        }
        console.log(`Fulfillment ${shipping.value.phase}; total now ${shipping.value.session.total()}`);

        const completed = await client.completeCheckout(checkoutId, {
            handlerId: handler?.id ?? 'mock_payment_handler',
            card: { token: 'success_token', brand: 'Visa', lastDigits: '4242' },
        });
        if (!completed.ok) {
            console.error('Payment failed:', completed.error.message);
            return;
        }
        console.log(`Order ${completed.value.order?.id}: ${completed.value.order?.permalink_url}`);
    });
}

main().catch(console.error);
