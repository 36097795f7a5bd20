import type { RawTable } from '../types/schema';

const REGIONS = ['North', 'South', 'East', 'West'];

/** 1000 orders over 100 customers; amount repeats every 500 rows. */
export const makeOrders = (): RawTable => ({
  columns: ['order_id', 'customer_id', 'amount'],
  rows: Array.from({ length: 1000 }, (_, index) => {
    const i = index + 1;
    return [i, ((i - 1) % 100) + 1, ((i * 37) % 500) + 0.5];
  })
});

export const makeCustomers = (): RawTable => ({
  columns: ['customer_id', 'name', 'region'],
  rows: Array.from({ length: 100 }, (_, index) => {
    const i = index + 1;
    return [i, `Customer ${i}`, REGIONS[i % 4]];
  })
});
