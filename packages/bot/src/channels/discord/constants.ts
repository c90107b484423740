// ── Slash Command Definitions ──────────────────────────────────────

export const LOOT_COMMAND_NAME = 'loot';
export const LOOT_ITEM_OPTION = 'item';

export const SLASH_COMMANDS = [
    {
        name: LOOT_COMMAND_NAME,
        description: 'Check Arc Raiders loot info',
        options: [{
            name: LOOT_ITEM_OPTION,
            description: 'Name of the item to look up',
            type: 3, // STRING
            required: true,
            autocomplete: true,
        }],
    },
];

// ── Prefix Command ─────────────────────────────────────────────────

export const COMMAND_PREFIX = '!loot-bot';

// ── Gateway ────────────────────────────────────────────────────────

export const GatewayOpcode = {
    DISPATCH: 0,
    HEARTBEAT: 1,
    IDENTIFY: 2,
    RESUME: 6,
    RECONNECT: 7,
    INVALID_SESSION: 9,
    HELLO: 10,
    HEARTBEAT_ACK: 11,
} as const;

export const GatewayIntent = {
    GUILDS: 1 << 0,
    GUILD_MESSAGES: 1 << 9,
    DIRECT_MESSAGES: 1 << 12,
    MESSAGE_CONTENT: 1 << 15,
} as const;

// Authentication failed, invalid shard, sharding required, invalid API
// version, invalid intents, disallowed intents.
export const FATAL_CLOSE_CODES: ReadonlySet<number> = new Set([4004, 4010, 4011, 4012, 4013, 4014]);

export const RECONNECT_DELAY_MS = 5000;

// ── Interactions ───────────────────────────────────────────────────

export const InteractionType = {
    APPLICATION_COMMAND: 2,
    AUTOCOMPLETE: 4,
} as const;

export const InteractionCallbackType = {
    DEFERRED_CHANNEL_MESSAGE: 5,
    AUTOCOMPLETE_RESULT: 8,
} as const;

/** Discord rejects message content longer than this. */
export const MESSAGE_LIMIT = 2000;
