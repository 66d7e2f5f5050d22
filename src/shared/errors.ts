/**
 * CyberSource Gateway - Errors
 *
 * Only failures that never reach the processor (or never come back from it)
 * are thrown. Declines and SOAP faults are GatewayResponse values.
 */

/**
 * GatewayError - Base class for everything the gateway throws
 */
export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

/**
 * ValidationError - Caller input rejected before a request is built
 */
export class ValidationError extends GatewayError {
  constructor(public readonly issues: string[]) {
    super(`Invalid gateway input: ${issues.join('; ')}`, 'VALIDATION_FAILED', false);
    this.name = 'ValidationError';
  }
}

/**
 * UnsupportedCardTypeError - Card brand has no processor code
 */
export class UnsupportedCardTypeError extends GatewayError {
  constructor(public readonly brand: string) {
    super(`Unsupported card type: ${brand}`, 'UNSUPPORTED_CARD_TYPE', false);
    this.name = 'UnsupportedCardTypeError';
  }
}

/**
 * TransportError - The processor could not be reached or answered with an
 * HTTP status that carries no reply document
 */
export class TransportError extends GatewayError {
  constructor(
    message: string,
    public readonly statusCode: number | null,
    retryable: boolean
  ) {
    super(message, 'TRANSPORT_FAILED', retryable);
    this.name = 'TransportError';
  }
}

/**
 * TestModeError - Raised by the canned test-card table for its error card
 */
export class TestModeError extends GatewayError {
  constructor(message: string) {
    super(message, 'TEST_MODE_ERROR', false);
    this.name = 'TestModeError';
  }
}
