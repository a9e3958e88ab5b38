import { MalformedQuantityError } from '../core/errors';
import { OfferId, StockCount } from '../core/types';

// Stock reported for the supplier's "more than ten" bucket
export const OVERFLOW_TOKEN = '>10';
export const OVERFLOW_STOCK = 100;

// The supplier reports a single remaining unit as "1"; it is listed as out of stock
export const SINGLE_UNIT_TOKEN = '1';

const INTEGER_TOKEN = /^[+-]?\d+$/;

/**
 * Map a raw feed quantity token to a stock count.
 *
 * ">10" becomes 100, "1" becomes 0, anything else must be a base-10 integer.
 */
export function classifyQuantity(rawQuantity: string, offerId?: OfferId): StockCount {
  const token = String(rawQuantity);

  if (token === OVERFLOW_TOKEN) {
    return OVERFLOW_STOCK;
  }

  if (token === SINGLE_UNIT_TOKEN) {
    return 0;
  }

  const trimmed = token.trim();
  if (!INTEGER_TOKEN.test(trimmed)) {
    throw MalformedQuantityError.forToken(token, offerId);
  }

  const count = parseInt(trimmed, 10);
  if (count < 0 || !Number.isSafeInteger(count)) {
    throw MalformedQuantityError.forToken(token, offerId);
  }

  // "-0" parses to -0
  return count === 0 ? 0 : count;
}
