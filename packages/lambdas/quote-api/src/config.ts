import { loadPolicyTable, type PolicyTable } from '@channel-pricing/core';

/**
 * Quote API configuration, read once per cold start
 */
export interface QuoteApiConfig {
  allowedOrigin: string;
  policies: PolicyTable;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): QuoteApiConfig {
  return {
    allowedOrigin: env.ALLOWED_ORIGIN || '*',
    // Throws on invalid overrides so a broken deploy fails at cold start
    policies: loadPolicyTable(env.PRICING_POLICY_OVERRIDES),
  };
}
