/**
 * CyberSource Gateway - Configuration
 *
 * Options accepted when creating a gateway:
 *   login / password  merchant id and the transaction key from the Business Center
 *   test              send to the test server (and answer test cards locally)
 *   vatRegNumber      seller VAT registration, needed for VAT on overseas customers
 *   nexus             "WI CA QC": states/provinces with physical presence; blank taxes everyone
 *   ignoreAvs         keep processing even when AVS fails
 *   ignoreCvv         keep processing even when the card verification check fails
 */

import { z } from 'zod';
import { ValidationError } from '../shared/errors';

export const TEST_URL = 'https://ics2wstest.ic3.com/commerce/1.x/transactionProcessor';
export const LIVE_URL = 'https://ics2ws.ic3.com/commerce/1.x/transactionProcessor';

export const GatewayConfigSchema = z.object({
  login: z.string().min(1, 'login is required'),
  password: z.string().min(1, 'password is required'),
  test: z.boolean().default(false),
  vatRegNumber: z.string().optional(),
  nexus: z.string().optional(),
  ignoreAvs: z.boolean().default(false),
  ignoreCvv: z.boolean().default(false),
  timeoutMs: z.number().int().positive().default(60000),
  testUrl: z.string().url().default(TEST_URL),
  liveUrl: z.string().url().default(LIVE_URL),
});

export type GatewayConfigInput = z.input<typeof GatewayConfigSchema>;
export type GatewayConfig = z.output<typeof GatewayConfigSchema>;

export type GatewayMode = 'test' | 'production';

let gatewayMode: GatewayMode = 'production';

/**
 * Force every gateway instance into test mode (or release it)
 */
export function setGatewayMode(mode: GatewayMode): void {
  gatewayMode = mode;
}

export function getGatewayMode(): GatewayMode {
  return gatewayMode;
}

/**
 * Validate gateway options
 *
 * @throws ValidationError listing every problem found
 */
export function parseGatewayConfig(input: GatewayConfigInput): GatewayConfig {
  const result = GatewayConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return result.data;
}

function envFlag(value: string | undefined): boolean {
  return value === 'true' || value === '1';
}

function envString(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value : undefined;
}

/**
 * Build gateway options from CYBERSOURCE_* variables.
 * Call dotenv.config() beforehand when a .env file should be honoured.
 */
export function loadGatewayConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const timeout = envString(env.CYBERSOURCE_TIMEOUT_MS);

  return parseGatewayConfig({
    login: env.CYBERSOURCE_LOGIN || '',
    password: env.CYBERSOURCE_PASSWORD || '',
    test: envFlag(env.CYBERSOURCE_TEST),
    vatRegNumber: envString(env.CYBERSOURCE_VAT_REG_NUMBER),
    nexus: envString(env.CYBERSOURCE_NEXUS),
    ignoreAvs: envFlag(env.CYBERSOURCE_IGNORE_AVS),
    ignoreCvv: envFlag(env.CYBERSOURCE_IGNORE_CVV),
    timeoutMs: timeout !== undefined ? parseInt(timeout, 10) : undefined,
  });
}
