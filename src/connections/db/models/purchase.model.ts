// Purchase Model - Based on migration 20261019_000003_create_purchases_table
// NUMERIC columns arrive from pg as strings and DATE columns are read through
// to_char(..., 'YYYY-MM-DD'), so both stay text until the report formatter.

export interface Purchase {
  id: number;
  product_code: number;
  description: string;
  quantity: string; // NUMERIC(15, 3)
  unit_price: string; // NUMERIC(15, 2)
  total_value: string; // NUMERIC(15, 2)
  date: string | null;
  account_id: number | null;
  user_id: number | null;
}
