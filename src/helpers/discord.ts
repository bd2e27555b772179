import axios from 'axios';
import type { ExecuteWebhook } from '../builder/executeWebhook.js';
import type { IDiscordMessage, IDiscordWebhook } from '../types/Discord.js';
import { logException, throwException } from './errors.js';

export const discord = axios.create({
	baseURL: process.env['DISCORD_API_URL'] || 'https://discord.com/api/v10',
	headers: {
		'Content-Type': 'application/json',
		'User-Agent': process.env['DISCORD_USER_AGENT'] || 'Webhook Execute Integration',
	},
});

function handleDiscordError(err: unknown, action: string): never {
	if (axios.isAxiosError(err) && err.response) {
		console.error(`Failed to ${action}. Discord API Error:`, err.response.data);
		throwException(
			err.response.status,
			`Discord API responded with status ${err.response.status}`,
			{ data: err.response.data },
		);
	}

	// Axios errors carry the request config, whose url holds the webhook token.
	if (axios.isAxiosError(err)) {
		console.error(`An unknown error occurred while trying to ${action}:`, err.message);
		logException(new Error(`Failed to ${action}: ${err.message}`));
		throw err;
	}

	console.error(`An unknown error occurred while trying to ${action}:`, err);
	logException(err);
	throw err;
}

/**
 * Executes a webhook with the given payload.
 *
 * When `wait` is true Discord returns the created message, otherwise the
 * request completes with no body and this resolves to `null`.
 */
async function executeWebhook(
	id: string,
	token: string,
	webhook: ExecuteWebhook,
	wait = false,
): Promise<IDiscordMessage | null> {
	try {
		const response = await discord.post<IDiscordMessage>(
			`/webhooks/${id}/${token}`,
			webhook.toJSON(),
			{ params: { wait } },
		);

		console.log(`Webhook ${id} successfully executed`);
		return wait ? response.data : null;
	} catch (err) {
		return handleDiscordError(err, `execute webhook ${id}`);
	}
}

async function getWebhookWithToken(id: string, token: string): Promise<IDiscordWebhook> {
	try {
		const response = await discord.get<IDiscordWebhook>(`/webhooks/${id}/${token}`);
		return response.data;
	} catch (err) {
		return handleDiscordError(err, `get webhook ${id}`);
	}
}

export default {
	executeWebhook,
	getWebhookWithToken,
};
