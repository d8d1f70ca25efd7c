/**
 * @packageDocumentation
 * @module UpdateMerger
 * @description
 * Read-merge-write updates for checkout sessions.
 *
 * The merchant's update endpoint replaces the whole resource: a field
 * left out of the PUT body may be read as "clear it". Every update is
 * therefore built from the latest snapshot plus the caller's change:
 *
 * 1. GET the current session (one round trip of staleness).
 * 2. Carry forward line items, currency and payment block unless overridden.
 * 3. PUT the full payload and decode the response.
 *
 * Two concurrent updates to the same session race at the merchant; there
 * is no version token to detect a lost update.
 */
import { CheckoutSession } from './CheckoutSession';
import { TransportClient } from '../transport/TransportClient';
import { TransportError } from '../types/errors';
import { Result } from '../types/result';
import { CheckoutChange, UpdateCheckoutPayload } from '../types/ucp';

export const DEFAULT_CURRENCY = 'USD';

export function sessionPath(checkoutId: string): string {
    return `/checkout-sessions/${encodeURIComponent(checkoutId)}`;
}

/**
 * Build the full PUT body for `change` applied over `snapshot`.
 *
 * A missing snapshot yields the protocol defaults, with `defaultCurrency`
 * standing in for the session currency; the merchant then rejects the
 * update itself if it needs the absent fields.
 */
export function mergeUpdate(
    checkoutId: string,
    snapshot: CheckoutSession | null,
    change: CheckoutChange = {},
    defaultCurrency: string = DEFAULT_CURRENCY
): UpdateCheckoutPayload {
    const current = snapshot?.toWire();
    const payload: UpdateCheckoutPayload = {
        id: checkoutId,
        currency: current?.currency ?? defaultCurrency,
        payment: current?.payment ?? { instruments: [], handlers: [] },
    };

    const lineItems = change.lineItems ?? current?.line_items;
    if (lineItems !== undefined) {
        payload.line_items = [...lineItems];
    }

    if (change.discountCodes !== undefined) {
        payload.discounts = { codes: [...change.discountCodes] };
    }

    if (change.fulfillment !== undefined) {
        payload.fulfillment = change.fulfillment;
    }

    return payload;
}

export class UpdateMerger {
    constructor(private transport: TransportClient, private defaultCurrency: string = DEFAULT_CURRENCY) { }

    async fetchSession(checkoutId: string): Promise<Result<CheckoutSession, TransportError>> {
        const response = await this.transport.send('GET', sessionPath(checkoutId));
        return response.ok ? CheckoutSession.decode(response.value) : response;
    }

    /**
     * Latest snapshot, or null when it cannot be fetched. The fetch failure
     * is logged and the update proceeds with protocol defaults.
     */
    async currentSnapshot(checkoutId: string): Promise<CheckoutSession | null> {
        const snapshot = await this.fetchSession(checkoutId);
        if (!snapshot.ok) {
            console.warn(
                `[UpdateMerger] Could not fetch checkout ${checkoutId}, updating without a snapshot:`,
                snapshot.error.message
            );
            return null;
        }
        return snapshot.value;
    }

    /**
     * {@link mergeUpdate} with this merger's default currency.
     */
    merge(checkoutId: string, snapshot: CheckoutSession | null, change: CheckoutChange): UpdateCheckoutPayload {
        return mergeUpdate(checkoutId, snapshot, change, this.defaultCurrency);
    }

    /**
     * Submit an already merged payload.
     */
    async submit(payload: UpdateCheckoutPayload): Promise<Result<CheckoutSession, TransportError>> {
        const response = await this.transport.send('PUT', sessionPath(payload.id), payload);
        return response.ok ? CheckoutSession.decode(response.value) : response;
    }

    /**
     * Fetch, merge and submit `change` in one step.
     */
    async apply(checkoutId: string, change: CheckoutChange): Promise<Result<CheckoutSession, TransportError>> {
        const snapshot = await this.currentSnapshot(checkoutId);
        return this.submit(this.merge(checkoutId, snapshot, change));
    }
}
