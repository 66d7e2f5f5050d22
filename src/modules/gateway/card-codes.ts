import { CardBrand } from '../../shared/types';
import { UnsupportedCardTypeError } from '../../shared/errors';

// processor's cardType codes
const CARD_TYPE_CODES: Readonly<Record<CardBrand, string>> = Object.freeze({
  visa: '001',
  master: '002',
  american_express: '003',
  discover: '004',
});

export const SUPPORTED_CARD_BRANDS: ReadonlyArray<CardBrand> = Object.freeze(
  ['visa', 'master', 'american_express', 'discover'] as const
);

export function isSupportedBrand(brand: string): brand is CardBrand {
  return SUPPORTED_CARD_BRANDS.some((supported) => supported === brand);
}

/**
 * @throws UnsupportedCardTypeError for any brand outside the table
 */
export function cardTypeCode(brand: string): string {
  if (!isSupportedBrand(brand)) {
    throw new UnsupportedCardTypeError(brand);
  }
  return CARD_TYPE_CODES[brand];
}
