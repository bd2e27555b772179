export { colorFromRgb, CreateEmbed } from './builder/createEmbed.js';
export { ExecuteWebhook, isWebhookField, type WebhookEntry } from './builder/executeWebhook.js';
export { default as discordWebhooks, discord as discordApi } from './helpers/discord.js';
export {
	isApiException,
	logException,
	setSentryClient,
	throwException,
	type ApiException,
} from './helpers/errors.js';
export type {
	ExecuteWebhookFields,
	IDiscordEmbed,
	IDiscordEmbedField,
	IDiscordMessage,
	IDiscordWebhook,
	IDiscordWebhookPayload,
	WebhookField,
} from './types/Discord.js';
export { NoOpSentryWrapper, SentryWrapper, type SentryClient } from './types/SentryClient.js';
