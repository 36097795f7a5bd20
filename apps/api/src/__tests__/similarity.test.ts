import { describe, it, expect } from 'vitest';
import { isIdentifierName, nameSimilarity, tableBase } from '../utils/similarity';
import { parseDate, parseNumeric } from '../utils/values';

describe('nameSimilarity', () => {
  it('scores exact matches after normalising case and separators', () => {
    expect(nameSimilarity('customer_id', 'CustomerID')).toBe(1);
  });

  it('matches a bare id to the table-qualified column', () => {
    expect(nameSimilarity('customer_id', 'id', 'orders', 'customers')).toBe(0.95);
    expect(nameSimilarity('id', 'customer_id', 'customers', 'orders')).toBe(0.95);
  });

  it('matches on the stem without an id suffix', () => {
    expect(nameSimilarity('customer_id', 'customer')).toBe(0.9);
  });

  it('matches containment', () => {
    expect(nameSimilarity('region', 'sales_region')).toBe(0.7);
  });

  it('caps fuzzy matches below containment', () => {
    expect(nameSimilarity('order_date', 'orderid')).toBeLessThanOrEqual(0.5);
    expect(nameSimilarity('', 'id')).toBe(0);
  });
});

describe('tableBase', () => {
  it('strips file extensions, staging markers and plurals', () => {
    expect(tableBase('Orders')).toBe('order');
    expect(tableBase('raw_customers.csv')).toBe('customer');
    expect(tableBase('categories')).toBe('category');
  });
});

describe('isIdentifierName', () => {
  it('looks at the last name token', () => {
    expect(isIdentifierName('customer_id')).toBe(true);
    expect(isIdentifierName('productCode')).toBe(true);
    expect(isIdentifierName('idea')).toBe(false);
  });
});

describe('parseNumeric', () => {
  it('reads formatted numbers', () => {
    expect(parseNumeric('$1,200.50')).toBe(1200.5);
    expect(parseNumeric('15%')).toBe(15);
    expect(parseNumeric('-3.5e2')).toBe(-350);
    expect(parseNumeric('0.5')).toBe(0.5);
  });

  it('rejects codes and malformed groups', () => {
    expect(parseNumeric('007')).toBeNull();
    expect(parseNumeric('1,2')).toBeNull();
    expect(parseNumeric('12abc')).toBeNull();
  });

  it('rejects values a double cannot hold exactly', () => {
    expect(parseNumeric('9007199254740991')).toBe(9007199254740991);
    expect(parseNumeric('9007199254740993')).toBeNull();
    expect(parseNumeric('12345678901234567890')).toBeNull();
    expect(parseNumeric('0.12345678901234567')).toBeNull();
  });
});

describe('parseDate', () => {
  it('normalises common date layouts', () => {
    expect(parseDate('2024-02-29')).toBe('2024-02-29');
    expect(parseDate('31/12/2024')).toBe('2024-12-31');
    expect(parseDate('Mar 5, 2024')).toBe('2024-03-05');
    expect(parseDate('5 March 2024')).toBe('2024-03-05');
  });

  it('treats timestamps without an offset as UTC', () => {
    expect(parseDate('2024-03-10 08:30')).toBe('2024-03-10T08:30:00.000Z');
    expect(parseDate('2024-03-10T08:30:00Z')).toBe('2024-03-10T08:30:00.000Z');
    expect(parseDate('2024-03-10T08:30:00-05:00')).toBe('2024-03-10T13:30:00.000Z');
  });

  it('rejects impossible days and non-dates', () => {
    expect(parseDate('2023-02-29')).toBeNull();
    expect(parseDate('hello')).toBeNull();
  });
});
