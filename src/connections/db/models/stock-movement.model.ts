// StockMovement Model - Based on migration 20261019_000004_create_stock_movements_table

export interface StockMovement {
  id: number;
  product_code: number;
  description: string;
  quantity: string; // NUMERIC(15, 3)
  unit_value: string; // NUMERIC(15, 2)
  total_value: string; // NUMERIC(15, 2)
  physical_quantity: string; // NUMERIC(15, 3)
  inbound_quantity: string; // NUMERIC(15, 3)
  outbound_quantity: string; // NUMERIC(15, 3)
  date: string | null;
  account_id: number | null;
  user_id: number | null;
}
