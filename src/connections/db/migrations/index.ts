import { MigrationInfo } from './types';

import * as migration001 from './20261019_000001_create_users_table';
import * as migration002 from './20261019_000002_create_sessions_table';
import * as migration003 from './20261019_000003_create_purchases_table';
import * as migration004 from './20261019_000004_create_stock_movements_table';

export const migrations: MigrationInfo[] = [
  { name: '20261019_000001_create_users_table', migration: migration001.migration },
  { name: '20261019_000002_create_sessions_table', migration: migration002.migration },
  { name: '20261019_000003_create_purchases_table', migration: migration003.migration },
  { name: '20261019_000004_create_stock_movements_table', migration: migration004.migration },
];
