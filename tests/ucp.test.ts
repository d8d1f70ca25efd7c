/**
 * UCP Client Tests
 *
 * Discovery, checkout creation, merge-updates and completion against an
 * in-process merchant.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { UCPClient } from '../src/ucp/UCPClient';
import {
    CapabilityNegotiator,
    CHECKOUT_CAPABILITY,
    DISCOUNT_CAPABILITY,
    FULFILLMENT_CAPABILITY,
} from '../src/ucp/CapabilityNegotiator';
import { withTransport } from '../src/transport/TransportClient';
import { DEFAULT_CONFIG } from '../src/config';
import { ProtocolHTTPError } from '../src/types/errors';
import { MockMerchant } from './helpers/mockMerchant';
import {
    checkoutSession,
    completedSession,
    discountedSession,
    discoveryDocument,
    lineItem,
    MERCHANT_URL,
    SESSION_ID,
    SESSION_PATH,
} from './helpers/fixtures';
import { unwrap, unwrapErr } from './helpers/result';

function withClient<T>(merchant: MockMerchant, fn: (client: UCPClient) => Promise<T>): Promise<T> {
    const config = merchant.config();
    return withTransport(MERCHANT_URL, config.transport, t => fn(new UCPClient(t, config.checkout)));
}

describe('UCPClient', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('discover', () => {
        it('should read version, capabilities and payment handlers', async () => {
            const merchant = new MockMerchant().on('GET', '/.well-known/ucp', { body: discoveryDocument() });

            const discovery = unwrap(await withClient(merchant, c => c.discover()));

            expect(discovery.ucpVersion).toBe('2026-01-11');
            expect(discovery.capabilities.map(cap => cap.name)).toEqual([
                'dev.ucp.shopping.checkout',
                'dev.ucp.shopping.fulfillment',
                'dev.ucp.shopping.gift_wrap',
            ]);
            expect(discovery.paymentHandlers.map(h => h.id)).toEqual(['mock_payment_handler', 'wallet_pay']);
            expect(discovery.paymentHandlers[1].config).toEqual({});
        });

        it('should default a document without ucp or payment sections', async () => {
            const merchant = new MockMerchant().on('GET', '/.well-known/ucp', { body: {} });

            const discovery = unwrap(await withClient(merchant, c => c.discover()));

            expect(discovery).toEqual({ ucpVersion: 'unknown', capabilities: [], paymentHandlers: [] });
        });

        it('should reject a document with the wrong shape', async () => {
            const merchant = new MockMerchant().on('GET', '/.well-known/ucp', { body: { ucp: { capabilities: 'all' } } });

            const error = unwrapErr(await withClient(merchant, c => c.discover()));

            expect(error.kind).toBe('decode');
            expect(error.context).toEqual({ entity: 'discovery' });
        });

        it('should report an unreachable merchant as a network error', async () => {
            const merchant = new MockMerchant().on('GET', '/.well-known/ucp', { networkError: 'getaddrinfo ENOTFOUND shop.invalid', code: 'ENOTFOUND' });

            const error = unwrapErr(await withClient(merchant, c => c.discover()));

            expect(error.kind).toBe('network');
            expect(error.message).toBe('Could not connect to merchant: getaddrinfo ENOTFOUND shop.invalid');
        });
    });

    describe('createCheckout', () => {
        it('should post the line items, buyer and default currency', async () => {
            const merchant = new MockMerchant().on('POST', '/checkout-sessions', { status: 201, body: checkoutSession() });

            const session = unwrap(await withClient(merchant, c => c.createCheckout({
                items: [{ id: 'tulip_bunch', quantity: 2 }],
                buyer: { name: 'Test Buyer', email: 'buyer@example.com' },
            })));

            expect(merchant.requests[0].body).toEqual({
                line_items: [{ item: { id: 'tulip_bunch', title: '' }, quantity: 2 }],
                buyer: { full_name: 'Test Buyer', email: 'buyer@example.com' },
                currency: 'USD',
                payment: { instruments: [], handlers: [] },
            });
            expect(session.id).toBe(SESSION_ID);
            expect(session.total()).toBe(3500);
        });

        it('should pass an explicit currency, item titles and handlers through', async () => {
            const merchant = new MockMerchant().on('POST', '/checkout-sessions', { status: 201, body: checkoutSession({ currency: 'EUR' }) });

            await withClient(merchant, c => c.createCheckout({
                items: [{ id: 'tulip_bunch', title: 'Bunch of Tulips', quantity: 1 }],
                buyer: { name: 'Test Buyer', email: 'buyer@example.com' },
                currency: 'EUR',
                paymentHandlers: [{ id: 'mock_payment_handler' }],
            }));

            expect(merchant.requests[0].body).toMatchObject({
                line_items: [{ item: { id: 'tulip_bunch', title: 'Bunch of Tulips' }, quantity: 1 }],
                currency: 'EUR',
                payment: { instruments: [], handlers: [{ id: 'mock_payment_handler' }] },
            });
        });

        it('should return the merchant rejection', async () => {
            const merchant = new MockMerchant().on('POST', '/checkout-sessions', { status: 400, body: { error: 'Unknown product' } });

            const error = unwrapErr(await withClient(merchant, c => c.createCheckout({
                items: [{ id: 'no_such_item', quantity: 1 }],
                buyer: { name: 'Test Buyer', email: 'buyer@example.com' },
            })));

            expect(error.message).toBe('HTTP error from merchant: 400 - {"error":"Unknown product"}');
        });
    });

    describe('getCheckout', () => {
        it('should fetch and decode the session', async () => {
            const merchant = new MockMerchant().on('GET', SESSION_PATH, { body: discountedSession() });

            const session = unwrap(await withClient(merchant, c => c.getCheckout(SESSION_ID)));

            expect(session.discounts.codes).toEqual(['SPRING10']);
        });
    });

    describe('updateCheckout', () => {
        it('should apply a discount code and keep the line items', async () => {
            const merchant = new MockMerchant()
                .on('POST', '/checkout-sessions', { status: 201, body: checkoutSession() })
                .on('GET', SESSION_PATH, { body: checkoutSession() })
                .on('PUT', SESSION_PATH, { body: discountedSession() });

            const [created, updated] = await withClient(merchant, async c => {
                const first = unwrap(await c.createCheckout({
                    items: [{ id: 'tulip_bunch', quantity: 1 }],
                    buyer: { name: 'Test Buyer', email: 'buyer@example.com' },
                }));
                const second = unwrap(await c.updateCheckout(first.id, { discountCodes: ['SPRING10'] }));
                return [first, second];
            });

            expect(created.total()).toBe(3500);
            expect(updated.total()).toBe(3150);
            expect(updated.discountAmount()).toBe(350);
            expect(merchant.requestsTo('PUT', SESSION_PATH)[0].body).toMatchObject({
                line_items: [lineItem()],
                discounts: { codes: ['SPRING10'] },
            });
        });

        it('should fall back to the configured currency when the session cannot be read', async () => {
            vi.spyOn(console, 'warn').mockImplementation(() => { });
            const merchant = new MockMerchant()
                .on('GET', SESSION_PATH, { status: 503, raw: 'Service Unavailable' })
                .on('PUT', SESSION_PATH, { body: checkoutSession({ currency: 'EUR' }) });
            const config = merchant.config({ checkout: { currency: 'EUR' } });

            await withTransport(MERCHANT_URL, config.transport, t =>
                new UCPClient(t, config.checkout).updateCheckout(SESSION_ID, { discountCodes: ['SPRING10'] })
            );

            expect(merchant.requestsTo('PUT', SESSION_PATH)[0].body).toHaveProperty('currency', 'EUR');
        });

        it('should surface an unknown checkout as an HTTP error', async () => {
            vi.spyOn(console, 'warn').mockImplementation(() => { });
            const merchant = new MockMerchant()
                .on('GET', /^\/checkout-sessions\//, { status: 404, body: { error: 'Checkout not found' } })
                .on('PUT', /^\/checkout-sessions\//, { status: 404, body: { error: 'Checkout not found' } });

            const error = unwrapErr(await withClient(merchant, c => c.updateCheckout('chk-missing', { discountCodes: ['SPRING10'] })));

            expect(error).toBeInstanceOf(ProtocolHTTPError);
            if (!(error instanceof ProtocolHTTPError)) return;
            expect(error.status).toBe(404);
            expect(error.body).toEqual({ error: 'Checkout not found' });
        });
    });

    describe('completeCheckout', () => {
        it('should post payment data built from the card and defaults', async () => {
            const merchant = new MockMerchant().on('POST', `${SESSION_PATH}/complete`, { body: completedSession() });

            const session = unwrap(await withClient(merchant, c => c.completeCheckout(SESSION_ID, {
                handlerId: 'mock_payment_handler',
                card: { token: 'success_token', brand: 'Visa', lastDigits: '4242' },
            })));

            expect(merchant.requests[0].body).toEqual({
                payment_data: {
                    id: expect.stringMatching(/^instr_[0-9a-f-]{36}$/),
                    handler_id: 'mock_payment_handler',
                    handler_name: 'mock_payment_handler',
                    type: 'card',
                    brand: 'Visa',
                    last_digits: '4242',
                    credential: { type: 'token', token: 'success_token' },
                    billing_address: DEFAULT_CONFIG.checkout.billingAddress,
                },
                risk_signals: { ip: '127.0.0.1', browser: 'ucp-checkout-agent' },
            });
            expect(session.isComplete).toBe(true);
            expect(session.order?.id).toBe('order-7d21');
        });

        it('should use a distinct instrument id per attempt and an explicit handler name', async () => {
            const merchant = new MockMerchant().on('POST', `${SESSION_PATH}/complete`, { body: completedSession() });
            const params = {
                handlerId: 'wallet_pay',
                handlerName: 'example.wallet_pay',
                card: { token: 'test-token', brand: 'Mastercard', lastDigits: '0005' },
            };

            await withClient(merchant, async c => {
                await c.completeCheckout(SESSION_ID, params);
                await c.completeCheckout(SESSION_ID, params);
            });

            const [first, second] = merchant.requests.map(r => r.body);
            expect(first).toMatchObject({ payment_data: { handler_id: 'wallet_pay', handler_name: 'example.wallet_pay' } });
            expect(first).not.toEqual(second);
        });

        it('should return a declined payment as an HTTP error', async () => {
            const merchant = new MockMerchant().on('POST', `${SESSION_PATH}/complete`, { status: 402, body: { error: 'Payment declined' } });

            const error = unwrapErr(await withClient(merchant, c => c.completeCheckout(SESSION_ID, {
                handlerId: 'mock_payment_handler',
                card: { token: 'fail_token', brand: 'Visa', lastDigits: '0002' },
            })));

            expect(error.message).toBe('HTTP error from merchant: 402 - {"error":"Payment declined"}');
            expect(error.retryable).toBe(false);
        });
    });
});

describe('CapabilityNegotiator', () => {
    const negotiator = new CapabilityNegotiator();

    it('should split merchant capabilities into agreed and rejected', async () => {
        const merchant = new MockMerchant().on('GET', '/.well-known/ucp', { body: discoveryDocument() });
        const discovery = unwrap(await withClient(merchant, c => c.discover()));

        expect(negotiator.negotiate(discovery)).toEqual({
            agreed: [CHECKOUT_CAPABILITY, FULFILLMENT_CAPABILITY],
            rejected: ['dev.ucp.shopping.gift_wrap'],
        });
        expect(negotiator.supports(discovery, FULFILLMENT_CAPABILITY)).toBe(true);
        expect(negotiator.supports(discovery, DISCOUNT_CAPABILITY)).toBe(false);
    });

    it('should list what the agent drives', () => {
        expect(negotiator.getSupportedCapabilities()).toEqual([
            CHECKOUT_CAPABILITY,
            DISCOUNT_CAPABILITY,
            FULFILLMENT_CAPABILITY,
        ]);
    });
});
