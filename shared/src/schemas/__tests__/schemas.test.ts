import { dateOnlySchema } from '../common.js';
import { InvoiceInputSchema } from '../invoices.js';
import { CreateProductSchema, UpdateProductSchema } from '../products.js';
import { MutateStockSchema, ProductFilterQuerySchema } from '../stock.js';

function firstMessage(result: { success: boolean; error?: { issues: Array<{ message: string }> } }): string | undefined {
  return result.error?.issues[0]?.message;
}

describe('dateOnlySchema', () => {
  it('accepts a real calendar date', () => {
    expect(dateOnlySchema.parse('2024-02-29')).toBe('2024-02-29');
  });

  it('rejects an impossible date', () => {
    expect(firstMessage(dateOnlySchema.safeParse('2023-02-29'))).toBe('Date must be a real calendar date');
  });

  it('rejects other formats', () => {
    expect(firstMessage(dateOnlySchema.safeParse('2024/01/01'))).toBe('Date must be in YYYY-MM-DD format');
  });
});

describe('CreateProductSchema', () => {
  it('defaults the opening stock to zero', () => {
    expect(CreateProductSchema.parse({ name: ' Wireless Mouse ', type: 'Mouse', buyPrice: 8, sellPrice: 15 })).toEqual({
      name: 'Wireless Mouse',
      type: 'Mouse',
      buyPrice: 8,
      sellPrice: 15,
      stock: 0,
    });
  });

  it('rejects a type outside the taxonomy', () => {
    const result = CreateProductSchema.safeParse({ name: 'Toaster X', type: 'Toaster', buyPrice: 1, sellPrice: 2 });
    expect(firstMessage(result)).toBe('Unknown product type "Toaster"');
  });

  it('rejects negative prices', () => {
    const result = CreateProductSchema.safeParse({ name: 'Mouse', type: 'Mouse', buyPrice: -1, sellPrice: 2 });
    expect(firstMessage(result)).toBe('Price cannot be negative');
  });
});

describe('UpdateProductSchema', () => {
  it('requires at least one field', () => {
    expect(firstMessage(UpdateProductSchema.safeParse({}))).toBe('Nothing to update');
  });

  it('accepts a single field', () => {
    expect(UpdateProductSchema.parse({ sellPrice: 12 })).toEqual({ sellPrice: 12 });
  });
});

describe('MutateStockSchema', () => {
  it('rejects a zero delta', () => {
    expect(firstMessage(MutateStockSchema.safeParse({ delta: 0, reason: 'count' }))).toBe('Delta must not be zero');
  });

  it('rejects a fractional delta', () => {
    expect(firstMessage(MutateStockSchema.safeParse({ delta: 1.5, reason: 'count' }))).toBe('Delta must be a whole number');
  });

  it('requires a reason', () => {
    expect(firstMessage(MutateStockSchema.safeParse({ delta: 2, reason: '   ' }))).toBe('Reason is required');
  });
});

describe('ProductFilterQuerySchema', () => {
  it('coerces numbers and drops values it cannot read', () => {
    const parsed = ProductFilterQuerySchema.parse({
      name: ' cable ',
      stockMax: '5',
      buyPriceMin: 'abc',
      sellPriceMin: '',
    });

    expect(parsed.name).toBe('cable');
    expect(parsed.stockMax).toBe(5);
    expect(parsed.buyPriceMin).toBeUndefined();
    expect(parsed.sellPriceMin).toBeUndefined();
  });

  it('accepts a bare date or an ISO timestamp for updatedAfter', () => {
    expect(ProductFilterQuerySchema.parse({ updatedAfter: ' 2024-03-10 ' }).updatedAfter).toBe('2024-03-10');
    expect(ProductFilterQuerySchema.parse({ updatedAfter: '2024-03-10T06:15:00Z' }).updatedAfter).toBe('2024-03-10T06:15:00Z');
  });

  it('rejects an updatedAfter it cannot read as a date', () => {
    const result = ProductFilterQuerySchema.safeParse({ updatedAfter: '10/03/2024' });

    expect(result.success).toBe(false);
    expect(firstMessage(result)).toBe('Updated-after must be a date (YYYY-MM-DD) or an ISO-8601 timestamp');
    expect(result.error?.issues[0]?.path).toEqual(['updatedAfter']);
  });
});

describe('InvoiceInputSchema', () => {
  it('defaults the discount of a stock invoice to zero', () => {
    const parsed = InvoiceInputSchema.parse({ source: 'stock', customerName: 'Walk-in', productName: 'Mouse', quantity: 2 });
    expect(parsed).toEqual({ source: 'stock', customerName: 'Walk-in', productName: 'Mouse', quantity: 2, discount: 0 });
  });

  it('coerces the sale id of a sale invoice', () => {
    const parsed = InvoiceInputSchema.parse({ source: 'sale', customerName: 'Walk-in', saleId: '3' });
    expect(parsed).toEqual({ source: 'sale', customerName: 'Walk-in', saleId: 3 });
  });

  it('requires the fields of the chosen source', () => {
    expect(InvoiceInputSchema.safeParse({ source: 'sale', customerName: 'Walk-in' }).success).toBe(false);
    expect(InvoiceInputSchema.safeParse({ source: 'stock', customerName: 'Walk-in', quantity: 1 }).success).toBe(false);
  });

  it('rejects an unknown source', () => {
    expect(InvoiceInputSchema.safeParse({ source: 'quote', customerName: 'Walk-in' }).success).toBe(false);
  });
});
