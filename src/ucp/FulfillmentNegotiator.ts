/**
 * @packageDocumentation
 * @module FulfillmentNegotiator
 * @description
 * Drives shipping selection through repeated merge-updates.
 *
 * The merchant reveals the fulfillment shape one round at a time:
 *
 * ```
 * Start ──request shipping──▶ DestinationOffered
 *       ──pick destination──▶ DestinationSelected / OptionsOffered
 *       ──pick option──────▶ Negotiated
 * ```
 *
 * Each round's body is merged over the previous round's response, not the
 * original snapshot, because the merchant may have rewritten line items.
 * The first offered destination (across methods) and the first offered
 * option on that destination's method are always chosen.
 *
 * Running out of destinations or options is not a failure: negotiation
 * stops and the latest session is returned with the phase reached.
 */
import { CheckoutSession } from './CheckoutSession';
import { UpdateMerger } from './UpdateMerger';
import { TransportError } from '../types/errors';
import { Result, ok } from '../types/result';
import {
  FulfillmentDestination,
  FulfillmentGroup,
  FulfillmentMethod,
  FulfillmentOption,
  FulfillmentRequest,
} from '../types/ucp';

export enum NegotiationPhase {
  Start = 'start',
  DestinationOffered = 'destination_offered',
  DestinationSelected = 'destination_selected',
  OptionsOffered = 'options_offered',
  Negotiated = 'negotiated',
}

export interface NegotiationOutcome {
  session: CheckoutSession;
  /** Last phase reached; anything short of Negotiated means fulfillment did not apply. */
  phase: NegotiationPhase;
  destinationId?: string;
  optionId?: string;
}

export interface DestinationChoice {
  method: FulfillmentMethod;
  /** Position of `method` in the response it was picked from. */
  methodIndex: number;
  destination: FulfillmentDestination;
}

export interface OptionChoice {
  group: FulfillmentGroup;
  option: FulfillmentOption;
}

/**
 * First destination of the first method that offers one.
 */
export function pickDestination(session: CheckoutSession): DestinationChoice | undefined {
  const methods = session.fulfillment?.methods ?? [];
  for (const [methodIndex, method] of methods.entries()) {
    const destination = method.destinations?.[0];
    if (destination) return { method, methodIndex, destination };
  }
  return undefined;
}

/**
 * First option of the first group that offers one, on the method chosen
 * in `chosen`. The method is found again by id, then by its selected
 * destination, then by position.
 */
export function pickOption(session: CheckoutSession, chosen: DestinationChoice): OptionChoice | undefined {
  const methods = session.fulfillment?.methods ?? [];
  const methodId = chosen.method.id;
  const method =
    (methodId !== undefined ? methods.find(m => m.id === methodId) : undefined) ??
    methods.find(m => m.selected_destination_id === chosen.destination.id) ??
    methods.at(chosen.methodIndex);

  for (const group of method?.groups ?? []) {
    const option = group.options?.[0];
    if (option) return { group, option };
  }
  return undefined;
}

export class FulfillmentNegotiator {
  constructor(private merger: UpdateMerger) { }

  async negotiate(checkoutId: string): Promise<Result<NegotiationOutcome, TransportError>> {
    const snapshot = await this.merger.currentSnapshot(checkoutId);

    // Phase 0: ask for shipping.
    const offered = await this.round(checkoutId, snapshot, {
      methods: [{ type: 'shipping' }],
    });
    if (!offered.ok) return offered;

    // Phase 1: choose a destination.
    const destinationChoice = pickDestination(offered.value);
    if (!destinationChoice) {
      return ok(this.stop(offered.value, NegotiationPhase.DestinationOffered));
    }
    const destinationId = destinationChoice.destination.id;
    const methodId = destinationChoice.method.id;

    const selected = await this.round(checkoutId, offered.value, {
      methods: [{ ...(methodId !== undefined && { id: methodId }), type: 'shipping', selected_destination_id: destinationId }],
    });
    if (!selected.ok) return selected;

    // Phase 2: the destination's option groups.
    const optionChoice = pickOption(selected.value, destinationChoice);
    if (!optionChoice) {
      return ok({ ...this.stop(selected.value, NegotiationPhase.DestinationSelected), destinationId });
    }
    const optionId = optionChoice.option.id;
    const groupId = optionChoice.group.id;

    // Phase 3: choose the option.
    const negotiated = await this.round(checkoutId, selected.value, {
      methods: [{
        ...(methodId !== undefined && { id: methodId }),
        type: 'shipping',
        selected_destination_id: destinationId,
        groups: [{ ...(groupId !== undefined && { id: groupId }), selected_option_id: optionId }],
      }],
    });
    if (!negotiated.ok) return negotiated;

    return ok({
      session: negotiated.value,
      phase: NegotiationPhase.Negotiated,
      destinationId,
      optionId,
    });
  }

  private round(
    checkoutId: string,
    previous: CheckoutSession | null,
    fulfillment: FulfillmentRequest
  ): Promise<Result<CheckoutSession, TransportError>> {
    return this.merger.submit(this.merger.merge(checkoutId, previous, { fulfillment }));
  }

  private stop(session: CheckoutSession, phase: NegotiationPhase): NegotiationOutcome {
    console.warn(`[FulfillmentNegotiator] Checkout ${session.id}: nothing offered after ${phase}, stopping`);
    return { session, phase };
  }
}
