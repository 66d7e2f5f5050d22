/**
 * CyberSource Gateway - Test Card Responder
 *
 * In test mode the gateway first asks this table whether the card number
 * is one of the canned test numbers; a hit is answered locally and never
 * reaches the processor.
 *
 *   "1" / "AUTHORIZED"  success
 *   "2" / "DECLINED"    failure
 *   "3" / "ERROR"       throws TestModeError
 */

import { GatewayResponse } from '../../shared/types';
import { TestModeError } from '../../shared/errors';

export const TEST_SUCCESS_MESSAGE = 'The transaction was successful';
export const TEST_FAILURE_MESSAGE = 'The transaction was unsuccessful';
export const TEST_ERROR_MESSAGE = 'The transaction had an error';
export const TEST_AUTHORIZATION = '53433';

export interface TestCardResponder {
  /**
   * @returns a canned response, or null to let the request go out
   */
  respond(cardNumber: string): GatewayResponse | null;
}

export class CannedTestCardResponder implements TestCardResponder {
  respond(cardNumber: string): GatewayResponse | null {
    switch (cardNumber.trim()) {
      case '1':
      case 'AUTHORIZED':
        return {
          success: true,
          message: TEST_SUCCESS_MESSAGE,
          params: {},
          test: true,
          authorization: TEST_AUTHORIZATION,
        };
      case '2':
      case 'DECLINED':
        return {
          success: false,
          message: TEST_FAILURE_MESSAGE,
          params: {},
          test: true,
        };
      case '3':
      case 'ERROR':
        throw new TestModeError(TEST_ERROR_MESSAGE);
      default:
        return null;
    }
  }
}
