/**
 * backend/src/shared/db/db.types.ts
 *
 * WHY:
 * - Kysely table interfaces for the two tables this service owns.
 * - Kept in sync with src/shared/db/migrations by hand; the schema is small and
 *   changes only through a migration in the same commit.
 *
 * RULES:
 * - snake_case here only. Domain types live in each module's *.types.ts.
 * - role/gender are text columns with CHECK constraints; mappers narrow them.
 */

import type { ColumnType, Generated } from 'kysely';

type Timestamp = ColumnType<Date, Date | string, Date | string>;
type DefaultedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export interface UsersTable {
  id: Generated<string>;
  last_name: string;
  first_name: string;
  middle_name: string | null;
  login: string;
  password_hash: string;
  role: string;
  gender: string;
  class_name: string | null;
  graduation_year: number | null;
  created_at: DefaultedTimestamp;
  updated_at: DefaultedTimestamp;
}

export interface RefreshTokensTable {
  id: Generated<string>;
  user_id: string;
  family_id: string;
  token_hash: string;
  expires_at: Timestamp;
  revoked: Generated<boolean>;
  revoked_at: Timestamp | null;
  replaced_by_id: string | null;
  created_at: DefaultedTimestamp;
}

export interface DB {
  users: UsersTable;
  refresh_tokens: RefreshTokensTable;
}
