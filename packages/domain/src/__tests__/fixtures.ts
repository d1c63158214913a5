import type { ItemMetrics } from '@invenlytics/types';

export const FIXED_NOW = new Date('2026-01-15T00:00:00.000Z');
export const fixedClock = (): Date => FIXED_NOW;

export function item(overrides: Partial<ItemMetrics> & { item_code: string }): ItemMetrics {
  return {
    annual_sales_qty: 1000,
    annual_sales_value: 10000,
    current_stock: 100,
    stock_value: 1000,
    item_age_days: 400,
    days_since_last_sale: 10,
    ...overrides,
  };
}

/**
 * Five items covering every rule outcome except SLOW
 */
export const SAMPLE_ITEMS: ItemMetrics[] = [
  {
    item_code: 'PUMP-A',
    item_name: 'Pump A',
    annual_sales_qty: 2500,
    annual_sales_value: 125000,
    current_stock: 200,
    stock_value: 10000,
    item_age_days: 400,
    days_since_last_sale: 2,
    sales_velocity: 6.8,
    turnover_ratio: 12.5,
  },
  {
    item_code: 'VALVE-B',
    item_name: 'Valve B',
    annual_sales_qty: 150,
    annual_sales_value: 15000,
    current_stock: 100,
    stock_value: 10000,
    item_age_days: 200,
    days_since_last_sale: 60,
    sales_velocity: 0.41,
    turnover_ratio: 1.5,
  },
  {
    item_code: 'FILTER-C',
    item_name: 'Filter C',
    annual_sales_qty: 800,
    annual_sales_value: 24000,
    current_stock: 150,
    stock_value: 4500,
    item_age_days: 600,
    days_since_last_sale: 200,
    sales_velocity: 2.19,
    turnover_ratio: 5.3,
  },
  {
    item_code: 'SEAL-D',
    item_name: 'Seal D',
    annual_sales_qty: 50,
    annual_sales_value: 5000,
    current_stock: 500,
    stock_value: 25000,
    item_age_days: 30,
    days_since_last_sale: 350,
    sales_velocity: 0.14,
    turnover_ratio: 0.1,
  },
  {
    item_code: 'GASKET-E',
    item_name: 'Gasket E',
    annual_sales_qty: 1200,
    annual_sales_value: 36000,
    current_stock: 300,
    stock_value: 9000,
    item_age_days: 25,
    days_since_last_sale: 1,
    sales_velocity: 3.29,
    turnover_ratio: 4.0,
  },
];

/**
 * Three tight velocity groups of three items each (10, 2 and 0.2 units/day)
 */
export function tieredItems(): ItemMetrics[] {
  const tiers: Array<{ prefix: string; qty: number[]; lastSale: number[] }> = [
    { prefix: 'FAST', qty: [3650, 3700, 3600], lastSale: [1, 2, 3] },
    { prefix: 'MID', qty: [730, 750, 710], lastSale: [10, 12, 11] },
    { prefix: 'SLOW', qty: [73, 75, 71], lastSale: [40, 45, 50] },
  ];
  return tiers.flatMap(({ prefix, qty, lastSale }) =>
    qty.map((annualQty, i) => ({
      item_code: `${prefix}-${i + 1}`,
      annual_sales_qty: annualQty,
      annual_sales_value: annualQty * 100,
      current_stock: 100,
      stock_value: 5000,
      item_age_days: 400,
      days_since_last_sale: lastSale[i] ?? 0,
    }))
  );
}
