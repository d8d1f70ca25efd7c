import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { AgentConfig, PartialAgentConfig } from './types/agent';
import { ConfigError } from './types/errors';

export const DEFAULT_CONFIG: AgentConfig = {
  transport: {
    timeoutMs: 30000,
    agentProfileUrl: 'https://ucp-agent.example/profile',
    debug: false,
    pool: {
      maxSockets: 10,
      keepAliveMsecs: 30000,
    },
  },
  checkout: {
    currency: 'USD',
    billingAddress: {
      street_address: '123 Main St',
      address_locality: 'Anytown',
      address_region: 'CA',
      address_country: 'US',
      postal_code: '12345',
    },
    riskSignals: {
      ip: '127.0.0.1',
      browser: 'ucp-checkout-agent',
    },
  },
};

const EnvSchema = z.object({
  UCP_AGENT_PROFILE_URL: z.string().url().optional(),
  UCP_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  UCP_SIGNING_KEY: z.string().regex(/^0x[0-9a-fA-F]{64}$/, 'expected a 0x-prefixed 32-byte hex key').optional(),
  UCP_DEBUG: z.enum(['true', 'false', '1', '0']).optional(),
  UCP_DEFAULT_CURRENCY: z.string().regex(/^[A-Z]{3}$/, 'expected an ISO 4217 code').optional(),
});

export interface LoadConfigOptions {
  /** Read a `.env` file into process.env first (default: true) */
  loadDotenv?: boolean;
}

/**
 * Merge a partial config over `base` (the defaults unless given). Keys
 * explicitly set to `undefined` keep the base value.
 */
export function resolveConfig(partial: PartialAgentConfig = {}, base: AgentConfig = DEFAULT_CONFIG): AgentConfig {
  const transport = partial.transport ?? {};
  const checkout = partial.checkout ?? {};
  const signingKey = transport.signingKey ?? base.transport.signingKey;
  const adapter = transport.adapter ?? base.transport.adapter;

  return {
    transport: {
      timeoutMs: transport.timeoutMs ?? base.transport.timeoutMs,
      agentProfileUrl: transport.agentProfileUrl ?? base.transport.agentProfileUrl,
      debug: transport.debug ?? base.transport.debug,
      pool: {
        maxSockets: transport.pool?.maxSockets ?? base.transport.pool.maxSockets,
        keepAliveMsecs: transport.pool?.keepAliveMsecs ?? base.transport.pool.keepAliveMsecs,
      },
      ...(signingKey !== undefined && { signingKey }),
      ...(adapter !== undefined && { adapter }),
    },
    checkout: {
      currency: checkout.currency ?? base.checkout.currency,
      billingAddress: checkout.billingAddress ?? base.checkout.billingAddress,
      riskSignals: checkout.riskSignals ?? base.checkout.riskSignals,
    },
  };
}

/**
 * Build the agent config from environment variables.
 *
 * Priority: explicit overrides > environment > defaults.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: LoadConfigOptions = {},
  overrides: PartialAgentConfig = {}
): AgentConfig {
  if (options.loadDotenv ?? true) {
    dotenvConfig();
  }

  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(String(issue.path[0]), issue.message);
  }
  const vars = parsed.data;

  const fromEnv: PartialAgentConfig = {
    transport: {
      ...(vars.UCP_AGENT_PROFILE_URL !== undefined && { agentProfileUrl: vars.UCP_AGENT_PROFILE_URL }),
      ...(vars.UCP_REQUEST_TIMEOUT_MS !== undefined && { timeoutMs: vars.UCP_REQUEST_TIMEOUT_MS }),
      ...(vars.UCP_SIGNING_KEY !== undefined && { signingKey: vars.UCP_SIGNING_KEY }),
      ...(vars.UCP_DEBUG !== undefined && { debug: vars.UCP_DEBUG === 'true' || vars.UCP_DEBUG === '1' }),
    },
    checkout: {
      ...(vars.UCP_DEFAULT_CURRENCY !== undefined && { currency: vars.UCP_DEFAULT_CURRENCY }),
    },
  };

  return resolveConfig(overrides, resolveConfig(fromEnv));
}
