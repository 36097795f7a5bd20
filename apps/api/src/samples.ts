import { recordsToTable } from './ingest/csv';
import type { SessionInput } from './types/schema';

const customers = [
  { customer_id: 'C001', customer_name: 'Jane Tan', region: 'North', signup_date: '2024-01-12' },
  { customer_id: 'C002', customer_name: 'Ali Rahman', region: 'North', signup_date: '2024-02-03' },
  { customer_id: 'C003', customer_name: 'Maya Lee', region: 'South', signup_date: '2024-02-11' },
  { customer_id: 'C004', customer_name: 'Omar Idris', region: 'East', signup_date: '2024-03-01' },
  { customer_id: 'C005', customer_name: 'Lina Chen', region: 'South', signup_date: '2024-03-09' },
  { customer_id: 'C006', customer_name: 'Ravi Kumar', region: 'West', signup_date: '2024-03-22' },
  { customer_id: 'C007', customer_name: 'Sara Lim', region: 'East', signup_date: '2024-04-02' },
  { customer_id: 'C008', customer_name: 'Tom Wong', region: 'West', signup_date: '2024-04-15' }
];

const products = [
  { product_id: 'P01', product_name: 'Notebook', category: 'Stationery', list_price: '$4.50' },
  { product_id: 'P02', product_name: 'Desk Lamp', category: 'Home', list_price: '$32.00' },
  { product_id: 'P03', product_name: 'Backpack', category: 'Travel', list_price: '$58.00' },
  { product_id: 'P04', product_name: 'Water Bottle', category: 'Travel', list_price: '$12.75' },
  { product_id: 'P05', product_name: 'Pen Set', category: 'Stationery', list_price: '$9.90' }
];

const ORDER_COUNT = 150;

// deterministic order lines spread over every customer and product
const orders = Array.from({ length: ORDER_COUNT }, (_, i) => {
  const customer = customers[(i * 3) % customers.length];
  const product = products[(i * 7) % products.length];
  const quantity = (i % 4) + 1;
  const unitPrice = Number(product.list_price.replace('$', ''));
  const day = (i % 28) + 1;
  return {
    order_id: 1000 + i,
    customer_id: customer.customer_id,
    product_id: product.product_id,
    quantity,
    unit_price: unitPrice,
    amount: Number((quantity * unitPrice).toFixed(2)),
    order_date: `2024-05-${String(day).padStart(2, '0')}`
  };
});

export const loadSampleDatasets = (): SessionInput => ({
  customers: recordsToTable(customers),
  products: recordsToTable(products),
  orders: recordsToTable(orders)
});
