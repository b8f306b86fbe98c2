export const DISCORD_BOT_EVENTS = {
  CONNECTED: 'discord-bot.connected',
  DISCONNECTED: 'discord-bot.disconnected',
  ERROR: 'discord-bot.error',
} as const;

/**
 * Accent colors for Discord embeds.
 * Values are decimal representations of hex colors for discord.js.
 */
export const EMBED_COLORS = {
  /** Lobby filling: Slate #2f3136 */
  LOBBY: 0x2f3136,
  /** Teams posted: Emerald #34d399 */
  TEAMS: 0x34d399,
  /** Account linked: Cyan #38bdf8 */
  ACCOUNT: 0x38bdf8,
  /** Error / Unlink: Red #ef4444 */
  ERROR: 0xef4444,
} as const;

/** Generic reply when a command handler throws. */
export const GENERIC_COMMAND_ERROR =
  'Something went wrong. Please try again later.';

/**
 * Convert Discord.js errors into operator-friendly messages for the logs.
 */
export function friendlyDiscordErrorMessage(error: unknown): string {
  if (!(error instanceof Error)) return 'Failed to connect with provided token';
  const raw = error.message;

  if (
    /disallowed intent|privileged intent/i.test(raw) ||
    ('code' in error && error.code === 4014)
  ) {
    return 'Missing a privileged gateway intent. Enable it in the Discord Developer Portal under Bot > Privileged Gateway Intents.';
  }
  if (/invalid token|TOKEN_INVALID/i.test(raw)) {
    return 'Invalid bot token. Please check DISCORD_BOT_TOKEN.';
  }
  if (/getaddrinfo|ENOTFOUND/i.test(raw)) {
    return 'Unable to reach Discord servers. Check your internet connection.';
  }
  if (/ECONNREFUSED/i.test(raw)) {
    return 'Connection to Discord was refused. Try again in a few moments.';
  }

  return 'Failed to connect with provided token';
}
