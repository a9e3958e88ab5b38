import { MalformedPriceError } from '../core/errors';
import { OfferId, PriceValue } from '../core/types';

/**
 * Reduce a raw price string to the digits of its whole part.
 *
 * Everything from the first "." on is dropped, then every non-digit is stripped:
 * "24'570.00 руб." gives "24570". A decimal comma is not a separator, so
 * "5'990,00 руб." gives "599000".
 */
export function priceDigits(rawPrice: string): string {
  const [wholePart = ''] = String(rawPrice).split('.', 1);
  return wholePart.replace(/[^0-9]/g, '');
}

/**
 * Map a raw feed price string to an integer price
 */
export function normalizePrice(rawPrice: string, offerId?: OfferId): PriceValue {
  const digits = priceDigits(rawPrice);

  if (digits === '') {
    throw MalformedPriceError.forString(rawPrice, offerId);
  }

  const value = Number(digits);
  if (!Number.isSafeInteger(value)) {
    throw MalformedPriceError.forString(rawPrice, offerId);
  }

  return value;
}
