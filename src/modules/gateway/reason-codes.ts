/**
 * CyberSource Gateway - Reason Codes
 * Maps the processor's numeric reasonCode to a readable message
 */

import reasonCodes from './data/reason-codes.json';

const REASON_MESSAGES: ReadonlyMap<string, string> = new Map(Object.entries(reasonCodes));

/**
 * Look up the message for a reason code ("100", 100, " 203 ")
 *
 * @returns undefined when the code is not in the table
 */
export function reasonMessage(code: string | number): string | undefined {
  return REASON_MESSAGES.get(String(code).trim());
}
