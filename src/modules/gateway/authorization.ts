/**
 * CyberSource Gateway - Authorization Token
 *
 * Links an authorize step to its later capture or void.
 * Format: orderId;requestId;requestToken
 *
 * Trailing absent components are dropped ("X1;R1"); a leading or middle
 * one keeps its empty slot (";R1;T1") so the parts that follow stay in
 * position. Components may never contain the separator; encode() enforces it
 * and separatorClashes() lets callers check first.
 */

import { ValidationError } from '../../shared/errors';

export const AUTHORIZATION_SEPARATOR = ';';

export interface AuthorizationParts {
  readonly orderId?: string;
  readonly requestId?: string;
  readonly requestToken?: string;
}

/**
 * Components that would break the token apart
 */
export function separatorClashes(parts: AuthorizationParts): string[] {
  return [parts.orderId, parts.requestId, parts.requestToken].filter(
    (value): value is string => value !== undefined && value.includes(AUTHORIZATION_SEPARATOR)
  );
}

/**
 * @throws ValidationError if a component contains the separator
 */
export function encodeAuthorization(parts: AuthorizationParts): string {
  const components = [parts.orderId, parts.requestId, parts.requestToken];

  const clashing = separatorClashes(parts);
  if (clashing.length > 0) {
    throw new ValidationError(
      clashing.map((value) => `authorization component "${value}" contains "${AUTHORIZATION_SEPARATOR}"`)
    );
  }

  const slots = components.map((value) => value ?? '');
  while (slots.length > 0 && slots[slots.length - 1] === '') {
    slots.pop();
  }
  return slots.join(AUTHORIZATION_SEPARATOR);
}

/**
 * Split a token positionally. Missing or empty parts come back undefined,
 * never as an error.
 */
export function decodeAuthorization(authorization: string): AuthorizationParts {
  const [orderId, requestId, requestToken] = authorization
    .split(AUTHORIZATION_SEPARATOR, 3)
    .map((value) => (value === '' ? undefined : value));

  return { orderId, requestId, requestToken };
}
