import {
  pgTable,
  varchar,
  timestamp,
  primaryKey,
  index,
} from 'drizzle-orm/pg-core';

/**
 * Riot accounts linked to Discord users.
 * A Discord user may link several Riot accounts; the most recently
 * linked one is used for lobby ratings.
 */
export const accounts = pgTable(
  'accounts',
  {
    discordId: varchar('discord_id', { length: 32 }).notNull(),
    /** Riot PUUIDs are 78 characters */
    puuid: varchar('puuid', { length: 78 }).notNull(),
    /** Riot ID captured at link time, for display only */
    gameName: varchar('game_name', { length: 32 }),
    tagLine: varchar('tag_line', { length: 8 }),
    createdAt: timestamp('created_at', { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.discordId, table.puuid] }),
    discordIdx: index('idx_accounts_discord').on(table.discordId),
  }),
);

export type AccountRow = typeof accounts.$inferSelect;
