import { InternalError } from '../errors/domain-errors';

const MONEY_DECIMALS = 2;

/**
 * Largest amount whose cents survive the 15-significant-digit read in
 * `roundMoney` (13 integer digits plus 2 decimals).
 */
export const MAX_MONEY_AMOUNT = 9_999_999_999_999.99;

/**
 * Rounds a monetary amount to 2 decimals, half up.
 *
 * The amount is first read at 15 significant digits so that float noise such
 * as `110.00000000000001` or `1.005` (stored as 1.00499999...) rounds the way
 * its decimal form reads. Every finalised amount in a quotation goes through
 * here.
 */
export function roundMoney(value: number): number {
  if (!Number.isFinite(value)) {
    throw new InternalError(`Cannot round non-finite amount: ${value}`);
  }

  const [mantissa, exponent = '0'] = value.toPrecision(15).split('e');
  const shifted = Math.round(
    Number(`${mantissa}e${Number(exponent) + MONEY_DECIMALS}`),
  );

  if (!Number.isSafeInteger(shifted)) return shifted / 10 ** MONEY_DECIMALS;

  // Object.is guards against -0 for tiny negative inputs.
  const rounded = Number(`${shifted}e-${MONEY_DECIMALS}`);
  return Object.is(rounded, -0) ? 0 : rounded;
}

const amountFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: MONEY_DECIMALS,
  maximumFractionDigits: MONEY_DECIMALS,
  useGrouping: true,
});

/** `1234.5` → `"1,234.50"`. Latin digits in every language. */
export function formatAmount(value: number): string {
  return amountFormat.format(value);
}

export function formatMoney(value: number, currency: string): string {
  return `${formatAmount(value)} ${currency}`;
}
