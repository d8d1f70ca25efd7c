/**
 * @packageDocumentation
 * @module AgentTypes
 * @description
 * Configuration for the shopping agent.
 *
 * - {@link TransportConfig}: how requests reach a merchant.
 * - {@link CheckoutDefaults}: values synthesized into checkout payloads.
 */
import type { AxiosAdapter } from 'axios';
import type { BillingAddress, RiskSignals } from './ucp';

export interface PoolConfig {
  /** Maximum sockets per host (default: 10) */
  maxSockets: number;
  /** Keep-alive initial delay in ms (default: 30000) */
  keepAliveMsecs: number;
}

export interface TransportConfig {
  /** Applied to every request, not to a whole operation (default: 30000) */
  timeoutMs: number;
  /** Rendered as `UCP-Agent: profile="<url>"` */
  agentProfileUrl: string;
  /** Hex private key; without one the request signature is a constant placeholder. */
  signingKey?: string;
  /** Log each request line to stderr */
  debug: boolean;
  pool: PoolConfig;
  /** Routes requests somewhere other than the network, e.g. an in-process merchant. */
  adapter?: AxiosAdapter;
}

export interface CheckoutDefaults {
  currency: string;
  billingAddress: BillingAddress;
  riskSignals: RiskSignals;
}

export interface AgentConfig {
  transport: TransportConfig;
  checkout: CheckoutDefaults;
}

export type PartialAgentConfig = {
  transport?: Partial<Omit<TransportConfig, 'pool'>> & { pool?: Partial<PoolConfig> };
  checkout?: Partial<CheckoutDefaults>;
};
