import type { ArgumentMetadata } from '@nestjs/common';
import { CreateQuoteDto, QuoteItemDto } from '../../quotes/dto/create-quote.dto';
import { ValidationError } from '../errors/domain-errors';
import { createValidationPipe } from './validation.pipe';

const metadata: ArgumentMetadata = {
  type: 'body',
  metatype: CreateQuoteDto,
  data: '',
};

function validBody(): Record<string, unknown> {
  return {
    client: { name: 'Acme', contact: 'buyer@acme.test', lang: 'en' },
    currency: 'SAR',
    items: [{ sku: 'A1', qty: 2, unit_cost: 100, margin_pct: 10 }],
    delivery_terms: 'EXW Riyadh',
  };
}

async function detailsFor(body: Record<string, unknown>): Promise<string[]> {
  try {
    await createValidationPipe().transform(body, metadata);
  } catch (error) {
    if (error instanceof ValidationError) return error.details;
    throw error;
  }
  throw new Error('expected validation to fail');
}

describe('createValidationPipe', () => {
  it('turns a valid body into DTO instances', async () => {
    const dto = await createValidationPipe().transform(validBody(), metadata);

    expect(dto).toBeInstanceOf(CreateQuoteDto);
    expect(dto.items[0]).toBeInstanceOf(QuoteItemDto);
    expect(dto.items[0].qty).toBe(2);
  });

  it('raises a ValidationError with nested property paths', async () => {
    const details = await detailsFor({
      ...validBody(),
      items: [{ sku: 'A1', qty: 0, unit_cost: -1, margin_pct: -2 }],
    });

    expect(details).toContain('items.0.qty: qty must not be less than 1');
    expect(details).toContain(
      'items.0.unit_cost: unit_cost must not be less than 0',
    );
    expect(details).toContain(
      'items.0.margin_pct: margin_pct must not be less than 0',
    );
  });

  it('caps quantities and unit costs', async () => {
    const details = await detailsFor({
      ...validBody(),
      items: [{ sku: 'A1', qty: 1e20, unit_cost: 1e308, margin_pct: 10 }],
    });

    expect(details).toEqual([
      'items.0.qty: qty must not be greater than 9007199254740991',
      'items.0.unit_cost: unit_cost must not be greater than 9999999999999.99',
    ]);
  });

  it('rejects an empty item list', async () => {
    const details = await detailsFor({ ...validBody(), items: [] });

    expect(details).toEqual(['items: items must contain at least 1 elements']);
  });

  it('rejects an unsupported language', async () => {
    const details = await detailsFor({
      ...validBody(),
      client: { name: 'Acme', contact: 'buyer@acme.test', lang: 'fr' },
    });

    expect(details).toEqual([
      'client.lang: lang must be one of the following values: en, ar',
    ]);
  });

  it('rejects a fractional quantity', async () => {
    const details = await detailsFor({
      ...validBody(),
      items: [{ sku: 'A1', qty: 1.5, unit_cost: 1, margin_pct: 0 }],
    });

    expect(details).toEqual(['items.0.qty: qty must be an integer number']);
  });

  it('rejects a missing client and unknown fields', async () => {
    const { client: _client, ...rest } = validBody();
    const details = await detailsFor({ ...rest, discount: 5 });

    expect(details).toContain('client: client should not be null or undefined');
    expect(details).toContain('discount: property discount should not exist');
  });
});
