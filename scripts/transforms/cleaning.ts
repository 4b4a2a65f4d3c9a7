/**
 * Cell-level cleaning helpers used by the staging rules.
 * All helpers pass null through.
 */

import usStates from '../data/us-states.json';

const STATE_NAMES = new Map<string, string>(Object.entries(usStates));

export function trimText(value: string | null): string | null {
  return value === null ? null : value.trim();
}

/**
 * Join the trimmed name parts that are present with a single space
 */
export function fullName(first: string | null, last: string | null): string | null {
  const parts = [trimText(first), trimText(last)].filter((part): part is string => part !== null && part !== '');
  if (parts.length === 0) {
    return null;
  }
  return parts.join(' ');
}

/**
 * Map a two-letter state code to its full name; anything else keeps its trimmed value
 */
export function standardizeState(value: string | null): string | null {
  const trimmed = trimText(value);
  if (trimmed === null) {
    return null;
  }
  return STATE_NAMES.get(trimmed.toUpperCase()) ?? trimmed;
}

/**
 * Round half away from zero to two decimals, as DECIMAL rounding does.
 * The scaled value is cut to 12 significant digits before rounding:
 * 10.1 * 0.95 is 9.594999... in binary and must still round to 9.60.
 */
export function round2(value: number): number {
  const scaled = Math.round(Number((Math.abs(value) * 100).toPrecision(12))) / 100;
  return value < 0 ? -scaled : scaled;
}

/**
 * Line sales amount: list_price × quantity × (1 − discount), rounded to cents
 */
export function lineSales(
  quantity: number | null,
  listPrice: number | null,
  discount: number | null
): number | null {
  if (quantity === null || listPrice === null || discount === null) {
    return null;
  }
  return round2(listPrice * quantity * (1 - discount));
}

/**
 * Fact total: quantity × list_price − discount × quantity × list_price, rounded to cents
 */
export function totalAmount(
  quantity: number | null,
  listPrice: number | null,
  discount: number | null
): number | null {
  if (quantity === null || listPrice === null || discount === null) {
    return null;
  }
  return round2(quantity * listPrice - discount * quantity * listPrice);
}
