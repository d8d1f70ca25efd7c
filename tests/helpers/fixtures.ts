/**
 * Merchant payloads shared across suites. Amounts are minor units.
 */

export const MERCHANT_URL = 'http://localhost:8182';
export const SESSION_ID = 'chk-3f1a9c';
export const SESSION_PATH = `/checkout-sessions/${SESSION_ID}`;

type Json = Record<string, unknown>;

export function lineItem(overrides: Json = {}): Json {
    return {
        id: 'li-1',
        item: { id: 'tulip_bunch', title: 'Bunch of Tulips', price: 3500 },
        quantity: 1,
        totals: [
            { type: 'subtotal', amount: 3500 },
            { type: 'total', amount: 3500 },
        ],
        ...overrides,
    };
}

export function checkoutSession(overrides: Json = {}): Json {
    return {
        id: SESSION_ID,
        status: 'ready_for_complete',
        currency: 'USD',
        line_items: [lineItem()],
        buyer: { full_name: 'Test Buyer', email: 'buyer@example.com' },
        totals: [
            { type: 'subtotal', amount: 3500 },
            { type: 'total', amount: 3500 },
        ],
        links: [],
        payment: { handlers: [{ id: 'mock_payment_handler' }], instruments: [] },
        discounts: {},
        ...overrides,
    };
}

export function discountedSession(overrides: Json = {}): Json {
    return checkoutSession({
        totals: [
            { type: 'subtotal', amount: 3500 },
            { type: 'discount', amount: 350 },
            { type: 'total', amount: 3150 },
        ],
        discounts: {
            codes: ['SPRING10'],
            applied: [
                { code: 'SPRING10', title: '10% Off', amount: 350, automatic: false },
            ],
        },
        ...overrides,
    });
}

export function completedSession(overrides: Json = {}): Json {
    return checkoutSession({
        status: 'complete',
        order: {
            id: 'order-7d21',
            permalink_url: `${MERCHANT_URL}/orders/order-7d21`,
        },
        ...overrides,
    });
}

export function discoveryDocument(): Json {
    return {
        ucp: {
            version: '2026-01-11',
            capabilities: [
                {
                    name: 'dev.ucp.shopping.checkout',
                    version: '2026-01-11',
                    spec: 'https://ucp.dev/specs/shopping/checkout',
                    schema: 'https://ucp.dev/schemas/shopping/checkout.json',
                },
                {
                    name: 'dev.ucp.shopping.fulfillment',
                    version: '2026-01-11',
                    spec: 'https://ucp.dev/specs/shopping/fulfillment',
                    extends: 'dev.ucp.shopping.checkout',
                },
                {
                    name: 'dev.ucp.shopping.gift_wrap',
                    version: '2026-01-11',
                },
            ],
        },
        payment: {
            handlers: [
                { id: 'mock_payment_handler', name: 'dev.ucp.mock_payment', version: '2026-01-11', config: {} },
                { id: 'wallet_pay', name: 'example.wallet_pay', version: '2026-01-11' },
            ],
        },
    };
}

// Fulfillment negotiation rounds

export const SHIPPING_LINE: Json = lineItem({
    id: 'li-ship',
    item: { id: 'shipping', title: 'Shipping' },
    totals: [{ type: 'total', amount: 0 }],
});

export function destinationsOffered(destinationIds: string[] = ['dest-home', 'dest-office']): Json {
    return checkoutSession({
        status: 'open',
        line_items: [lineItem(), SHIPPING_LINE],
        fulfillment: {
            methods: [{
                id: 'method-ship',
                type: 'shipping',
                line_item_ids: ['li-1'],
                destinations: destinationIds.map(id => ({ id, address_locality: 'Anytown' })),
            }],
        },
    });
}

export function optionsOffered(optionIds: string[] = ['opt-standard', 'opt-express']): Json {
    return checkoutSession({
        status: 'open',
        line_items: [lineItem(), SHIPPING_LINE],
        payment: { handlers: [{ id: 'mock_payment_handler' }], instruments: [{ id: 'instr-prev' }] },
        fulfillment: {
            methods: [{
                id: 'method-ship',
                type: 'shipping',
                destinations: [{ id: 'dest-home' }],
                selected_destination_id: 'dest-home',
                groups: [{
                    id: 'group-1',
                    line_item_ids: ['li-1'],
                    options: optionIds.map(id => ({ id, title: id, totals: [{ type: 'total', amount: 500 }] })),
                }],
            }],
        },
    });
}

export function negotiatedSession(): Json {
    return checkoutSession({
        status: 'ready_for_complete',
        line_items: [lineItem(), SHIPPING_LINE],
        totals: [
            { type: 'subtotal', amount: 3500 },
            { type: 'fulfillment', amount: 500 },
            { type: 'total', amount: 4000 },
        ],
        fulfillment: {
            methods: [{
                id: 'method-ship',
                type: 'shipping',
                selected_destination_id: 'dest-home',
                groups: [{ id: 'group-1', selected_option_id: 'opt-standard', options: [{ id: 'opt-standard' }] }],
            }],
        },
    });
}
