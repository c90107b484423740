/**
 * Error thrown when the Discord REST API returns a non-OK response.
 */
export class DiscordApiError extends Error {
    constructor(
        public readonly status: number,
        public readonly body: string,
        public readonly method: string,
        public readonly path: string,
    ) {
        super(`Discord API error ${status} (${method} ${path}): ${body}`);
        this.name = 'DiscordApiError';
    }
}

/**
 * Gateway connection closed with a code that rules out reconnecting,
 * or closed before the session ever became ready.
 */
export class DiscordGatewayError extends Error {
    constructor(public readonly code: number, reason: string) {
        super(`Discord Gateway closed with code ${code}${reason ? `: ${reason}` : ''}`);
        this.name = 'DiscordGatewayError';
    }
}
