import { z } from 'zod';

/**
 * Lane roles for a 5v5 custom lobby, in display order.
 */
export const LANE_ROLES = ['TOP', 'JUNGLE', 'MID', 'BOTTOM', 'SUPPORT'] as const;

export const LaneRoleSchema = z.enum(LANE_ROLES);
export type LaneRole = z.infer<typeof LaneRoleSchema>;

/** Active players needed before teams can be balanced. */
export const LOBBY_CAPACITY = 10;

/** Players per team. */
export const TEAM_SIZE = 5;

export const LobbyStateSchema = z.enum(['FILLING', 'READY']);
export type LobbyState = z.infer<typeof LobbyStateSchema>;

/**
 * One active player as shown on the lobby message.
 */
export const LobbyCandidateSchema = z.object({
    identity: z.string(),
    roles: z.array(LaneRoleSchema),
    rating: z.number().int(),
    /** `Name#TAG` of the linked Riot account, once known */
    riotId: z.string().nullable(),
});
export type LobbyCandidateDto = z.infer<typeof LobbyCandidateSchema>;

/**
 * Read-only projection of a lobby's candidate pool.
 * GET /lobbies/:lobbyId
 */
export const LobbyStatusSchema = z.object({
    state: LobbyStateSchema,
    count: z.number().int().min(0).max(LOBBY_CAPACITY),
    capacity: z.literal(LOBBY_CAPACITY),
    candidates: z.array(LobbyCandidateSchema),
    /** Waitlisted identities, longest-waiting first */
    waitlist: z.array(z.string()),
    waitlistCount: z.number().int().min(0),
});
export type LobbyStatusDto = z.infer<typeof LobbyStatusSchema>;
