/**
 * Drizzle schema for the account and refresh token tables.
 * Mirrors packages/database/migrations/0001_create_accounts.sql.
 */

import {
  pgTable,
  varchar,
  text,
  boolean,
  bigserial,
  timestamp,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';

export const accounts = pgTable(
  'accounts',
  {
    id: varchar('id', { length: 16 }).primaryKey(),
    email: text('email').notNull(),
    passwordHash: text('password_hash').notNull(),
    name: text('name').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
    deletedAt: timestamp('deleted_at', { withTimezone: true }),
  },
  (table) => ({
    emailIdx: uniqueIndex('idx_accounts_email').on(table.email),
    deletedAtIdx: index('idx_accounts_deleted_at').on(table.deletedAt),
  })
);

export const refreshTokens = pgTable(
  'refresh_tokens',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    accountId: varchar('account_id', { length: 16 })
      .notNull()
      .references(() => accounts.id),
    token: text('token').notNull(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    isRevoked: boolean('is_revoked').notNull().default(false),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    tokenIdx: uniqueIndex('idx_refresh_tokens_token').on(table.token),
    accountIdIdx: index('idx_refresh_tokens_account_id').on(table.accountId),
  })
);

export type AccountRow = typeof accounts.$inferSelect;
export type RefreshTokenRow = typeof refreshTokens.$inferSelect;
