import WebSocket from 'ws';
import { BaseChannelAdapter } from '../base';
import type { LootCatalog } from '../../loot/catalog';
import type { LootRequest, ReplyTarget } from '../../loot/types';
import { logger, errorMessage } from '../../utils/logger';
import { chunkMessage } from './chunk';
import {
    FATAL_CLOSE_CODES,
    GatewayIntent,
    GatewayOpcode,
    RECONNECT_DELAY_MS,
    SLASH_COMMANDS,
} from './constants';
import { DiscordApiError, DiscordGatewayError } from './errors';
import {
    DiscordHandlerContext,
    InteractionResponse,
    handleInteraction,
    handleMessage,
} from './handlers';
import {
    DiscordConfig,
    DiscordInteraction,
    gatewayBotSchema,
    gatewayPayloadSchema,
    guildSchema,
    helloSchema,
    interactionSchema,
    messageSchema,
    readySchema,
} from './types';

const GATEWAY_QUERY = '?v=10&encoding=json';

// Replies come from an external workflow; never let them ping anyone.
const NO_MENTIONS = { parse: [] };

// ── Discord Adapter ────────────────────────────────────────────────

/**
 * Discord bot adapter for loot lookups.
 *
 *   slash  — `/loot item:<name>` with catalog autocomplete
 *   prefix — `!loot-bot ...` plain-text messages
 *
 * Keeps one Gateway WebSocket open (resuming after drops) and talks to
 * the REST API with fetch.
 */
export class DiscordAdapter extends BaseChannelAdapter implements DiscordHandlerContext {
    private readonly apiBase = 'https://discord.com/api/v10';
    private gatewayWs: WebSocket | null = null;
    private gatewayUrl?: string;
    private resumeUrl?: string;
    private heartbeatInterval?: NodeJS.Timeout;
    private reconnectTimer?: NodeJS.Timeout;
    private sequence: number | null = null;
    private closing = false;
    private everReady = false;

    public sessionId?: string;
    public applicationId?: string;

    // guildId → name, filled from GUILD_CREATE
    private guildNames = new Map<string, string>();

    constructor(public readonly config: DiscordConfig, public readonly catalog: LootCatalog) {
        super();
    }

    // ── Lifecycle ──────────────────────────────────────────────────

    async connect(): Promise<void> {
        this.closing = false;
        this.setStatus('connecting');

        const gateway = gatewayBotSchema.parse(await this.apiRequest('GET', '/gateway/bot'));
        this.gatewayUrl = gateway.url + GATEWAY_QUERY;

        await this.connectGateway(this.gatewayUrl);
        logger.info('Discord adapter connected', { variant: this.config.variant });
    }

    async disconnect(): Promise<void> {
        this.closing = true;
        if (this.heartbeatInterval) clearInterval(this.heartbeatInterval);
        if (this.reconnectTimer) clearTimeout(this.reconnectTimer);

        if (this.gatewayWs) {
            this.gatewayWs.close(1000, 'Bot shutting down');
            this.gatewayWs = null;
        }
        this.setStatus('disconnected');
        logger.info('Discord adapter disconnected');
    }

    // ── Handler Context ────────────────────────────────────────────

    guildName(guildId?: string): string | undefined {
        return guildId ? this.guildNames.get(guildId) : undefined;
    }

    startTyping(channelId: string): void {
        this.apiRequest('POST', `/channels/${channelId}/typing`).catch((err) => {
            logger.debug('Typing indicator failed', { channelId, error: errorMessage(err) });
        });
    }

    submitRequest(request: LootRequest): void {
        this.emit('request', request);
    }

    async respondToInteraction(interaction: DiscordInteraction, body: InteractionResponse): Promise<void> {
        await this.apiRequest(
            'POST',
            `/interactions/${interaction.id}/${interaction.token}/callback`,
            body,
            false,
        );
    }

    // ── Gateway WebSocket ──────────────────────────────────────────

    private connectGateway(url: string): Promise<void> {
        return new Promise((resolve, reject) => {
            const ws = new WebSocket(url);
            this.gatewayWs = ws;

            let settled = false;
            const ready = () => {
                if (settled) return;
                settled = true;
                resolve();
            };
            const fail = (err: Error) => {
                if (settled) return;
                settled = true;
                reject(err);
            };

            ws.on('open', () => {
                logger.info('Discord Gateway WebSocket opened');
            });

            ws.on('message', (data: WebSocket.RawData) => {
                this.handleFrame(rawToString(data), ready);
            });

            ws.on('close', (code: number, reason: Buffer) => {
                if (ws !== this.gatewayWs) return;
                this.handleClose(code, reason.toString(), fail);
            });

            ws.on('error', (err: Error) => {
                logger.error('Discord Gateway error', { error: err.message });
                fail(err);
            });
        });
    }

    private handleClose(code: number, reason: string, fail: (err: Error) => void): void {
        if (this.heartbeatInterval) clearInterval(this.heartbeatInterval);
        this.gatewayWs = null;

        if (this.closing) {
            this.setStatus('disconnected');
            return;
        }

        logger.warn(`Discord Gateway closed with code ${code}`, { reason });

        if (FATAL_CLOSE_CODES.has(code) || !this.everReady) {
            const err = new DiscordGatewayError(code, reason);
            this.setStatus('error');
            if (this.everReady) this.emit('error', err);
            else fail(err);
            return;
        }

        this.setStatus('connecting');
        this.reconnectTimer = setTimeout(() => {
            const url = this.sessionId && this.resumeUrl ? this.resumeUrl : this.gatewayUrl;
            if (!url) return;
            logger.info('Reconnecting to Discord Gateway...', { resume: Boolean(this.sessionId) });
            this.connectGateway(url).catch((err) => {
                logger.error('Discord Gateway reconnect failed', { error: errorMessage(err) });
            });
        }, RECONNECT_DELAY_MS);
    }

    private handleFrame(raw: string, ready: () => void): void {
        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (err) {
            logger.warn('Discarding unparseable Gateway frame', { error: errorMessage(err) });
            return;
        }

        const frame = gatewayPayloadSchema.safeParse(parsed);
        if (!frame.success) {
            logger.warn('Discarding malformed Gateway frame');
            return;
        }

        const { op, t, s, d } = frame.data;
        if (typeof s === 'number') this.sequence = s;

        switch (op) {
            case GatewayOpcode.HELLO: {
                const hello = helloSchema.safeParse(d);
                if (!hello.success) {
                    logger.warn('Discarding malformed HELLO frame');
                    break;
                }
                this.startHeartbeat(hello.data.heartbeat_interval);
                if (this.sessionId && this.sequence !== null) this.sendResume();
                else this.sendIdentify();
                break;
            }

            case GatewayOpcode.DISPATCH:
                if (t === 'READY') {
                    if (this.onReady(d)) ready();
                } else if (t === 'RESUMED') {
                    logger.info('Discord Gateway session resumed');
                    this.setStatus('connected');
                    ready();
                } else if (t) {
                    this.handleDispatch(t, d);
                }
                break;

            case GatewayOpcode.HEARTBEAT:
                this.sendHeartbeat();
                break;

            case GatewayOpcode.HEARTBEAT_ACK:
                break;

            case GatewayOpcode.RECONNECT:
                logger.info('Discord requested reconnect');
                this.gatewayWs?.close(4000, 'Reconnect requested');
                break;

            case GatewayOpcode.INVALID_SESSION:
                logger.warn('Discord invalid session', { resumable: d === true });
                if (d !== true) {
                    this.sessionId = undefined;
                    this.sequence = null;
                }
                this.gatewayWs?.close(4000, 'Invalid session');
                break;
        }
    }

    private onReady(data: unknown): boolean {
        const parsed = readySchema.safeParse(data);
        if (!parsed.success) {
            logger.error('Discarding malformed READY payload');
            return false;
        }

        const ready = parsed.data;
        this.sessionId = ready.session_id;
        this.resumeUrl = ready.resume_gateway_url ? ready.resume_gateway_url + GATEWAY_QUERY : undefined;
        this.applicationId = ready.application.id;
        this.everReady = true;
        this.setStatus('connected');
        logger.info(`Discord bot ready: ${ready.user.username}`, { userId: ready.user.id });

        if (this.config.variant === 'slash') {
            this.registerSlashCommands().catch((err) => {
                logger.error('Slash command registration failed', { error: errorMessage(err) });
            });
        }
        return true;
    }

    private intents(): number {
        if (this.config.variant === 'prefix') {
            return GatewayIntent.GUILDS
                | GatewayIntent.GUILD_MESSAGES
                | GatewayIntent.DIRECT_MESSAGES
                | GatewayIntent.MESSAGE_CONTENT;
        }
        return GatewayIntent.GUILDS;
    }

    private sendIdentify(): void {
        this.sendFrame(GatewayOpcode.IDENTIFY, {
            token: this.config.botToken,
            intents: this.intents(),
            properties: {
                os: process.platform,
                browser: 'loot-relay',
                device: 'loot-relay',
            },
        });
    }

    private sendResume(): void {
        this.sendFrame(GatewayOpcode.RESUME, {
            token: this.config.botToken,
            session_id: this.sessionId,
            seq: this.sequence,
        });
    }

    private startHeartbeat(intervalMs: number): void {
        if (this.heartbeatInterval) clearInterval(this.heartbeatInterval);
        this.heartbeatInterval = setInterval(() => this.sendHeartbeat(), intervalMs);
    }

    private sendHeartbeat(): void {
        this.sendFrame(GatewayOpcode.HEARTBEAT, this.sequence);
    }

    private sendFrame(op: number, d: unknown): void {
        const ws = this.gatewayWs;
        if (!ws || ws.readyState !== WebSocket.OPEN) return;
        ws.send(JSON.stringify({ op, d }));
    }

    // ── Event Dispatch ─────────────────────────────────────────────

    private handleDispatch(event: string, data: unknown): void {
        switch (event) {
            case 'GUILD_CREATE':
            case 'GUILD_UPDATE': {
                const guild = guildSchema.safeParse(data);
                if (guild.success && guild.data.name) this.guildNames.set(guild.data.id, guild.data.name);
                break;
            }
            case 'GUILD_DELETE': {
                const guild = guildSchema.safeParse(data);
                if (guild.success && !guild.data.unavailable) this.guildNames.delete(guild.data.id);
                break;
            }
            case 'MESSAGE_CREATE': {
                const msg = messageSchema.safeParse(data);
                if (msg.success) handleMessage(this, msg.data);
                break;
            }
            case 'INTERACTION_CREATE': {
                const interaction = interactionSchema.safeParse(data);
                if (!interaction.success) {
                    logger.warn('Discarding malformed interaction');
                    break;
                }
                handleInteraction(this, interaction.data).catch((err) => {
                    logger.error('Interaction handling failed', {
                        interactionId: interaction.data.id,
                        error: errorMessage(err),
                    });
                });
                break;
            }
        }
    }

    // ── Sending ────────────────────────────────────────────────────

    /**
     * Send reply text, split across messages when it exceeds Discord's
     * limit. Failures are logged; there is no one left to tell.
     */
    async reply(target: ReplyTarget, content: string): Promise<boolean> {
        const [first, ...rest] = chunkMessage(content);

        try {
            if (target.kind === 'channel') {
                for (const chunk of [first, ...rest]) {
                    await this.apiRequest('POST', `/channels/${target.channelId}/messages`, {
                        content: chunk,
                        allowed_mentions: NO_MENTIONS,
                    });
                }
            } else {
                const webhookPath = `/webhooks/${target.applicationId}/${target.interactionToken}`;
                await this.apiRequest('PATCH', `${webhookPath}/messages/@original`, {
                    content: first,
                    allowed_mentions: NO_MENTIONS,
                }, false);
                for (const chunk of rest) {
                    await this.apiRequest('POST', webhookPath, {
                        content: chunk,
                        allowed_mentions: NO_MENTIONS,
                    }, false);
                }
            }
            return true;
        } catch (err) {
            logger.error('Error sending reply to Discord', { target: target.kind, error: errorMessage(err) });
            return false;
        }
    }

    // ── Slash Command Registration ─────────────────────────────────

    private async registerSlashCommands(): Promise<void> {
        if (!this.applicationId) return;

        const endpoint = this.config.guildId
            ? `/applications/${this.applicationId}/guilds/${this.config.guildId}/commands`
            : `/applications/${this.applicationId}/commands`;

        await this.apiRequest('PUT', endpoint, SLASH_COMMANDS);
        logger.info(`Discord slash commands registered (${SLASH_COMMANDS.length} commands)`, {
            scope: this.config.guildId ? 'guild' : 'global',
        });
    }

    // ── REST API ───────────────────────────────────────────────────

    /**
     * Call the REST API. Interaction callbacks and interaction webhooks
     * authenticate with their token in the path, so they skip the bot header.
     */
    public async apiRequest(method: string, path: string, body?: unknown, auth = true): Promise<unknown> {
        const headers: Record<string, string> = { 'Content-Type': 'application/json' };
        if (auth) headers.Authorization = `Bot ${this.config.botToken}`;

        const res = await fetch(`${this.apiBase}${path}`, {
            method,
            headers,
            body: body === undefined ? undefined : JSON.stringify(body),
        });

        if (res.status === 204) return null;

        const text = await res.text();
        if (!res.ok) throw new DiscordApiError(res.status, text, method, path);

        return text ? JSON.parse(text) : null;
    }
}

function rawToString(data: WebSocket.RawData): string {
    if (Array.isArray(data)) return Buffer.concat(data).toString();
    if (Buffer.isBuffer(data)) return data.toString();
    return Buffer.from(data).toString();
}
