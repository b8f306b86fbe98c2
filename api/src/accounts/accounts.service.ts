import { Inject, Injectable, Logger } from '@nestjs/common';
import { and, desc, eq } from 'drizzle-orm';
import { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import type { LinkedAccountDto } from '@rift-lobby/contract';
import { DrizzleAsyncProvider } from '../drizzle/drizzle.module';
import * as schema from '../drizzle/schema';

export interface LinkAccountInput {
  discordId: string;
  puuid: string;
  gameName: string | null;
  tagLine: string | null;
}

/**
 * Discord user ↔ Riot account links.
 */
@Injectable()
export class AccountsService {
  private readonly logger = new Logger(AccountsService.name);

  constructor(
    @Inject(DrizzleAsyncProvider)
    private db: PostgresJsDatabase<typeof schema>,
  ) {}

  /**
   * Link a Riot account. Re-linking the same PUUID refreshes the stored
   * Riot ID and makes it the most recent link.
   */
  async link(input: LinkAccountInput): Promise<LinkedAccountDto> {
    const [row] = await this.db
      .insert(schema.accounts)
      .values({
        discordId: input.discordId,
        puuid: input.puuid,
        gameName: input.gameName,
        tagLine: input.tagLine,
      })
      .onConflictDoUpdate({
        target: [schema.accounts.discordId, schema.accounts.puuid],
        set: {
          gameName: input.gameName,
          tagLine: input.tagLine,
          createdAt: new Date(),
        },
      })
      .returning();

    this.logger.log(`Linked Riot account for Discord user ${input.discordId}`);
    return this.toDto(row);
  }

  /**
   * Remove one link (by PUUID) or every link for a Discord user.
   * @returns number of links removed
   */
  async unlink(discordId: string, puuid?: string): Promise<number> {
    const removed = await this.db
      .delete(schema.accounts)
      .where(
        puuid
          ? and(
              eq(schema.accounts.discordId, discordId),
              eq(schema.accounts.puuid, puuid),
            )
          : eq(schema.accounts.discordId, discordId),
      )
      .returning({ puuid: schema.accounts.puuid });

    if (removed.length > 0) {
      this.logger.log(
        `Unlinked ${removed.length} Riot account(s) for Discord user ${discordId}`,
      );
    }
    return removed.length;
  }

  /** Linked accounts, most recent first. */
  async listForDiscordUser(discordId: string): Promise<LinkedAccountDto[]> {
    const rows = await this.db
      .select()
      .from(schema.accounts)
      .where(eq(schema.accounts.discordId, discordId))
      .orderBy(desc(schema.accounts.createdAt));

    return rows.map((row) => this.toDto(row));
  }

  /** The link used for lobby ratings, or null when none exists. */
  async latestAccount(discordId: string): Promise<LinkedAccountDto | null> {
    const [row] = await this.db
      .select()
      .from(schema.accounts)
      .where(eq(schema.accounts.discordId, discordId))
      .orderBy(desc(schema.accounts.createdAt))
      .limit(1);

    return row ? this.toDto(row) : null;
  }

  private toDto(row: schema.AccountRow): LinkedAccountDto {
    return {
      discordId: row.discordId,
      puuid: row.puuid,
      gameName: row.gameName,
      tagLine: row.tagLine,
      createdAt: row.createdAt.toISOString(),
    };
  }
}
