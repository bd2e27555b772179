import type {
	ExecuteWebhookFields,
	IDiscordEmbed,
	IDiscordWebhookPayload,
	WebhookField,
} from '../types/Discord.js';

const WEBHOOK_FIELDS = ['content', 'username', 'avatar_url', 'tts', 'embeds'] as const;

export function isWebhookField(key: string): key is WebhookField {
	return WEBHOOK_FIELDS.some((field) => field === key);
}

export type WebhookEntry = [WebhookField, ExecuteWebhookFields[WebhookField]];

/**
 * Builds the body of a single webhook execution.
 *
 * Fields keep the order in which they were first set. Setting a field that is
 * already present replaces its value in the same position, so a fresh builder
 * always serializes `tts` first.
 *
 * @example
 * const webhook = ExecuteWebhook.default()
 * 	.content("Here's some information on today's events:")
 * 	.embeds([new CreateEmbed().title('Events').build()]);
 *
 * await discordWebhooks.executeWebhook(id, token, webhook);
 */
export class ExecuteWebhook {
	// Plain object keys iterate in creation order; reassignment keeps the slot.
	private readonly payload: IDiscordWebhookPayload = { tts: false };

	static default(): ExecuteWebhook {
		return new ExecuteWebhook();
	}

	/** Override the default avatar of the webhook with an image URL. */
	avatarUrl(avatarUrl: string): this {
		this.payload.avatar_url = avatarUrl;
		return this;
	}

	/**
	 * Set the content of the message.
	 *
	 * May be omitted when at least one embed is set via {@link embeds}.
	 */
	content(content: string): this {
		this.payload.content = content;
		return this;
	}

	/** Replace the embeds attached to the message. */
	embeds(embeds: readonly IDiscordEmbed[]): this {
		this.payload.embeds = [...embeds];
		return this;
	}

	tts(tts: boolean): this {
		this.payload.tts = tts;
		return this;
	}

	/** Override the default username of the webhook. */
	username(username: string): this {
		this.payload.username = username;
		return this;
	}

	get(field: 'embeds'): IDiscordEmbed[] | undefined;
	get<K extends Exclude<WebhookField, 'embeds'>>(field: K): IDiscordWebhookPayload[K];
	get(field: WebhookField): IDiscordWebhookPayload[WebhookField] {
		const value = this.payload[field];
		return Array.isArray(value) ? [...value] : value;
	}

	has(field: WebhookField): boolean {
		return this.payload[field] !== undefined;
	}

	get size(): number {
		return this.fields().length;
	}

	fields(): WebhookField[] {
		return Object.keys(this.payload).filter(isWebhookField);
	}

	entries(): WebhookEntry[] {
		const entries: WebhookEntry[] = [];

		for (const field of this.fields()) {
			const value = this.payload[field];
			if (value !== undefined) {
				entries.push([field, Array.isArray(value) ? [...value] : value]);
			}
		}

		return entries;
	}

	toJSON(): IDiscordWebhookPayload {
		const payload = { ...this.payload };
		if (payload.embeds) {
			payload.embeds = [...payload.embeds];
		}

		return payload;
	}
}
