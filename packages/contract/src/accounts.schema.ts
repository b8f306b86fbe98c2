import { z } from 'zod';

/**
 * Riot ID as typed by a player, e.g. `Player#NA1`.
 * Game names are 3-16 characters and tag lines 3-5.
 */
export const RiotIdSchema = z
    .string()
    .trim()
    .regex(/^[^#]{3,16}#[A-Za-z0-9]{3,5}$/, 'Riot ID must look like Name#TAG')
    .transform((value) => {
        const [gameName, tagLine] = value.split('#');
        return { gameName: gameName.trim(), tagLine };
    });
export type RiotId = z.infer<typeof RiotIdSchema>;

export const LinkedAccountSchema = z.object({
    discordId: z.string(),
    puuid: z.string(),
    gameName: z.string().nullable(),
    tagLine: z.string().nullable(),
    createdAt: z.string().datetime(),
});
export type LinkedAccountDto = z.infer<typeof LinkedAccountSchema>;
