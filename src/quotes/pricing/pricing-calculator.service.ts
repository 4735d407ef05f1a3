import { Injectable } from '@nestjs/common';
import { ValidationError } from '../../common/errors/domain-errors';
import { MAX_MONEY_AMOUNT, roundMoney } from '../../common/money/money';
import type {
  LineItem,
  PricedLineItem,
  Quotation,
  QuotationInput,
} from '../quote.types';

function optionalText(value?: string | null): string | null {
  const trimmed = (value ?? '').trim();
  return trimmed || null;
}

/** Rounded amount, or null when it cannot be represented to the cent. */
function boundedAmount(raw: number): number | null {
  if (!Number.isFinite(raw) || Math.abs(raw) > MAX_MONEY_AMOUNT) return null;
  return roundMoney(raw);
}

function tooLarge(path: string, field: string): string {
  return `${path}: ${field} exceeds the maximum amount of ${MAX_MONEY_AMOUNT}`;
}

/**
 * Turns raw line items into a priced quotation. Pure: the result depends on
 * the input only.
 */
@Injectable()
export class PricingCalculatorService {
  buildQuotation(input: QuotationInput): Quotation {
    if (!input.items.length) {
      throw new ValidationError('A quotation needs at least one line item', [
        'items must contain at least 1 element',
      ]);
    }

    const problems = input.items.flatMap((item, index) =>
      this.validateItem(item, index),
    );
    if (problems.length) {
      throw new ValidationError('Invalid line items', problems);
    }

    const items: PricedLineItem[] = [];
    const overflows: string[] = [];
    input.items.forEach((item, index) => {
      const priced = this.priceItem(item, `items.${index}`);
      if (typeof priced === 'string') overflows.push(priced);
      else items.push(priced);
    });
    if (overflows.length) {
      throw new ValidationError('Line item amounts are too large', overflows);
    }

    const grandTotal = boundedAmount(
      items.reduce((sum, item) => sum + item.line_total, 0),
    );
    if (grandTotal === null) {
      throw new ValidationError('Line item amounts are too large', [
        tooLarge('grand_total', 'grand_total'),
      ]);
    }

    return Object.freeze({
      client: Object.freeze({ ...input.client }),
      currency: input.currency,
      items: Object.freeze(items),
      grand_total: grandTotal,
      delivery_terms: optionalText(input.delivery_terms),
      notes: optionalText(input.notes),
    });
  }

  /** The priced item, or the problem line when an amount is out of range. */
  private priceItem(item: LineItem, at: string): PricedLineItem | string {
    const unitPrice = boundedAmount(
      item.unit_cost * (1 + item.margin_pct / 100),
    );
    if (unitPrice === null) return tooLarge(`${at}.unit_price`, 'unit_price');

    const lineTotal = boundedAmount(unitPrice * item.qty);
    if (lineTotal === null) return tooLarge(`${at}.line_total`, 'line_total');

    return Object.freeze({
      sku: item.sku,
      qty: item.qty,
      unit_cost: item.unit_cost,
      margin_pct: item.margin_pct,
      unit_price: unitPrice,
      line_total: lineTotal,
    });
  }

  private validateItem(item: LineItem, index: number): string[] {
    const at = `items.${index}`;
    const problems: string[] = [];

    if (typeof item.sku !== 'string' || !item.sku.trim()) {
      problems.push(`${at}.sku: sku should not be empty`);
    }
    if (!Number.isInteger(item.qty) || item.qty <= 0) {
      problems.push(`${at}.qty: qty must be a positive integer`);
    } else if (!Number.isSafeInteger(item.qty)) {
      problems.push(
        `${at}.qty: qty must not be greater than ${Number.MAX_SAFE_INTEGER}`,
      );
    }
    if (!Number.isFinite(item.unit_cost) || item.unit_cost < 0) {
      problems.push(`${at}.unit_cost: unit_cost must not be negative`);
    } else if (item.unit_cost > MAX_MONEY_AMOUNT) {
      problems.push(
        `${at}.unit_cost: unit_cost must not be greater than ${MAX_MONEY_AMOUNT}`,
      );
    }
    if (!Number.isFinite(item.margin_pct) || item.margin_pct < 0) {
      problems.push(`${at}.margin_pct: margin_pct must not be negative`);
    }

    return problems;
  }
}
