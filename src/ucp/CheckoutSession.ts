/**
 * @packageDocumentation
 * @module CheckoutSession
 * @description
 * Immutable snapshot of a merchant-held checkout session.
 *
 * The merchant is authoritative for all arithmetic: {@link CheckoutSession.total}
 * and friends look up the first totals entry of a type, they never sum line
 * items. Statuses outside the known set are kept as-is.
 */
import { CheckoutSessionSchema } from './schemas';
import { DecodeError } from '../types/errors';
import { Result, err, ok } from '../types/result';
import {
  CheckoutSessionWire,
  CheckoutStatus,
  Discounts,
  Fulfillment,
  LineItem,
  Order,
  PaymentBlock,
  TotalsEntry,
  TotalsType,
} from '../types/ucp';

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

const NO_LINE_ITEMS: readonly LineItem[] = Object.freeze([]);

export class CheckoutSession {
  readonly id: string;
  readonly status: CheckoutStatus;
  readonly currency: string;
  readonly lineItems: readonly LineItem[];
  readonly totals: readonly TotalsEntry[];
  readonly discounts: Discounts;
  readonly fulfillment?: Fulfillment;
  readonly order?: Order;
  readonly payment?: PaymentBlock;

  private constructor(private readonly wire: CheckoutSessionWire) {
    this.id = wire.id;
    this.status = wire.status;
    this.currency = wire.currency;
    this.lineItems = wire.line_items ?? NO_LINE_ITEMS;
    this.totals = wire.totals;
    this.discounts = wire.discounts;
    this.fulfillment = wire.fulfillment ?? undefined;
    this.order = wire.order ?? undefined;
    this.payment = wire.payment;
  }

  /**
   * Decode a merchant response body. Only structure is checked.
   */
  static decode(data: unknown): Result<CheckoutSession, DecodeError> {
    const parsed = CheckoutSessionSchema.safeParse(data);
    if (!parsed.success) {
      return err(new DecodeError(parsed.error, { entity: 'checkout_session' }));
    }
    return ok(new CheckoutSession(deepFreeze(parsed.data)));
  }

  /**
   * Amount of the first totals entry with this type, or 0 when absent.
   */
  amountOf(type: TotalsType): number {
    return this.totals.find(entry => entry.type === type)?.amount ?? 0;
  }

  total(): number {
    return this.amountOf('total');
  }

  subtotal(): number {
    return this.amountOf('subtotal');
  }

  discountAmount(): number {
    return this.amountOf('discount');
  }

  get isComplete(): boolean {
    return this.status === 'complete';
  }

  /**
   * The decoded wire object, frozen. Unknown merchant fields are included.
   */
  toWire(): CheckoutSessionWire {
    return this.wire;
  }

  toJSON(): CheckoutSessionWire {
    return this.wire;
  }
}
