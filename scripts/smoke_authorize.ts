/**
 * ============================================
 * SMOKE TEST - AUTHORIZE / CAPTURE / VOID
 * ============================================
 *
 * Runs one authorize -> capture -> void cycle against the test server
 * with the credentials from .env (see .env.example).
 *
 * USAGE:
 *   npx ts-node scripts/smoke_authorize.ts [cardNumber]
 *
 * Card number "1" is answered by the local test card table and never
 * leaves the machine; use a processor test card to reach the test server.
 *
 * ============================================
 */

import * as dotenv from 'dotenv';
import { CyberSourceGateway, GatewayResponse, loadGatewayConfigFromEnv } from '../src';

dotenv.config();

function report(step: string, response: GatewayResponse): void {
  console.log(`${response.success ? '✅' : '❌'} ${step}: ${response.message ?? '(no message)'}`);
  if (response.authorization) {
    console.log(`   authorization: ${response.authorization}`);
  }
}

async function run(): Promise<void> {
  const config = loadGatewayConfigFromEnv();
  const gateway = new CyberSourceGateway({ ...config, test: true });
  const orderId = `smoke-${Date.now()}`;

  const card = {
    number: process.argv[2] || '1',
    month: 12,
    year: new Date().getFullYear() + 2,
    brand: 'visa',
    verificationValue: '123',
    firstName: 'Test',
    lastName: 'Cardholder',
  };

  console.log('='.repeat(60));
  console.log(`  SMOKE TEST (order ${orderId})`);
  console.log('='.repeat(60));

  const auth = await gateway.authorize(1000, card, {
    orderId,
    billingAddress: { address1: '1 Main St', city: 'Madison', state: 'WI', zip: '53703', country: 'US', email: 'test@example.com' },
  });
  report('authorize', auth);
  if (!auth.success || !auth.authorization) {
    process.exitCode = 1;
    return;
  }

  const capture = await gateway.capture(1000, auth.authorization);
  report('capture', capture);

  if (capture.authorization) {
    report('void', await gateway.void(capture.authorization));
  }
}

run().catch((error: unknown) => {
  console.error('[Smoke] FATAL:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
