import type { LootCatalog } from '../../loot/catalog';
import type { LootRequest } from '../../loot/types';
import { logger, errorMessage } from '../../utils/logger';
import {
    COMMAND_PREFIX,
    InteractionCallbackType,
    InteractionType,
    LOOT_COMMAND_NAME,
    LOOT_ITEM_OPTION,
} from './constants';
import type {
    DiscordConfig,
    DiscordInteraction,
    DiscordInteractionOption,
    DiscordMessagePayload,
} from './types';

/**
 * Body of an interaction callback.
 */
export type InteractionResponse =
    | { type: typeof InteractionCallbackType.DEFERRED_CHANNEL_MESSAGE }
    | {
        type: typeof InteractionCallbackType.AUTOCOMPLETE_RESULT;
        data: { choices: Array<{ name: string; value: string }> };
    };

/**
 * What the handlers need from the adapter.
 */
export interface DiscordHandlerContext {
    readonly config: DiscordConfig;
    readonly catalog: LootCatalog;
    guildName(guildId?: string): string | undefined;
    startTyping(channelId: string): void;
    respondToInteraction(interaction: DiscordInteraction, body: InteractionResponse): Promise<void>;
    submitRequest(request: LootRequest): void;
}

// ── Prefix Commands ─────────────────────────────────────────────

/**
 * `!loot-bot ...` listener. Everything on the message counts as the command.
 */
export function handleMessage(ctx: DiscordHandlerContext, msg: DiscordMessagePayload): void {
    if (ctx.config.variant !== 'prefix') return;

    // Ignore bot messages, our own included
    if (msg.author.bot) return;

    const content = msg.content.trim();
    if (!content.toLowerCase().startsWith(COMMAND_PREFIX)) return;

    ctx.startTyping(msg.channel_id);

    ctx.submitRequest({
        eventId: msg.id,
        variant: 'prefix',
        content,
        channelId: msg.channel_id,
        authorId: msg.author.id,
        username: msg.author.username,
        guildId: msg.guild_id,
        guildName: ctx.guildName(msg.guild_id),
        replyTo: { kind: 'channel', channelId: msg.channel_id },
    });
}

// ── Interaction Handling ────────────────────────────────────────

export async function handleInteraction(ctx: DiscordHandlerContext, interaction: DiscordInteraction): Promise<void> {
    if (ctx.config.variant !== 'slash') return;
    if (interaction.data?.name !== LOOT_COMMAND_NAME) return;

    switch (interaction.type) {
        case InteractionType.AUTOCOMPLETE:
            await handleAutocomplete(ctx, interaction);
            break;
        case InteractionType.APPLICATION_COMMAND:
            await handleLootCommand(ctx, interaction);
            break;
    }
}

async function handleAutocomplete(ctx: DiscordHandlerContext, interaction: DiscordInteraction): Promise<void> {
    const options = interaction.data?.options || [];
    const focused = options.find(o => o.focused) ?? options.find(o => o.name === LOOT_ITEM_OPTION);

    await ctx.respondToInteraction(interaction, {
        type: InteractionCallbackType.AUTOCOMPLETE_RESULT,
        data: { choices: ctx.catalog.suggest(optionText(focused)) },
    });
}

/**
 * `/loot item:<name>` — acknowledge first, since the webhook may take
 * longer than Discord's three-second response window.
 */
async function handleLootCommand(ctx: DiscordHandlerContext, interaction: DiscordInteraction): Promise<void> {
    const user = interaction.member?.user || interaction.user;
    if (!user || !interaction.channel_id) {
        logger.warn('Ignoring /loot interaction without user or channel', { interactionId: interaction.id });
        return;
    }

    const item = optionText(interaction.data?.options?.find(o => o.name === LOOT_ITEM_OPTION));

    try {
        await ctx.respondToInteraction(interaction, {
            type: InteractionCallbackType.DEFERRED_CHANNEL_MESSAGE,
        });
    } catch (err) {
        logger.warn('Could not acknowledge /loot interaction', {
            interactionId: interaction.id,
            error: errorMessage(err),
        });
        return;
    }

    ctx.submitRequest({
        eventId: interaction.id,
        variant: 'slash',
        content: `/loot ${item}`,
        item,
        channelId: interaction.channel_id,
        authorId: user.id,
        username: user.username,
        guildId: interaction.guild_id,
        guildName: ctx.guildName(interaction.guild_id),
        replyTo: {
            kind: 'interaction',
            applicationId: interaction.application_id,
            interactionToken: interaction.token,
        },
    });
}

function optionText(option?: DiscordInteractionOption): string {
    if (option?.value === undefined) return '';
    return String(option.value);
}
