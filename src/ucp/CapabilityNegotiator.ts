/**
 * @packageDocumentation
 * @module CapabilityNegotiator
 * @description
 * Matches what a merchant advertises in its discovery document against what
 * this agent can drive (checkout, discounts, fulfillment).
 */
import { DiscoveryResult } from '../types/ucp';

export const CHECKOUT_CAPABILITY = 'dev.ucp.shopping.checkout';
export const DISCOUNT_CAPABILITY = 'dev.ucp.shopping.discount';
export const FULFILLMENT_CAPABILITY = 'dev.ucp.shopping.fulfillment';

export interface NegotiationResult {
  agreed: string[];
  rejected: string[];
}

export class CapabilityNegotiator {
  private supportedCapabilities = [CHECKOUT_CAPABILITY, DISCOUNT_CAPABILITY, FULFILLMENT_CAPABILITY];

  /**
   * Split the merchant's capabilities into those this agent drives and the rest.
   */
  negotiate(discovery: DiscoveryResult): NegotiationResult {
    const requested = discovery.capabilities.map(cap => cap.name);
    const agreed = requested.filter(cap => this.supportedCapabilities.includes(cap));
    const rejected = requested.filter(cap => !this.supportedCapabilities.includes(cap));
    return { agreed, rejected };
  }

  supports(discovery: DiscoveryResult, capability: string): boolean {
    return discovery.capabilities.some(cap => cap.name === capability);
  }

  getSupportedCapabilities(): string[] {
    return [...this.supportedCapabilities];
  }
}
