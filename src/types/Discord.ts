export interface IDiscordEmbedField {
	name: string; // Name of the field (max 256 characters)
	value: string; // Value of the field (max 1024 characters)
	inline?: boolean;
}

export interface IDiscordEmbed {
	/** The title of the embed (max 256 characters) */
	title?: string;

	/** The type of embed (always "rich" for webhook embeds) */
	type?: 'rich' | 'image' | 'video' | 'gifv' | 'article' | 'link';

	/** The description of the embed (max 4096 characters) */
	description?: string;

	/** The URL of the embed (will be treated as the title's hyperlink) */
	url?: string;

	timestamp?: string; // ISO8601 timestamp (e.g., "2024-10-25T16:46:50.000Z")

	/** The color code of the embed (as an integer) */
	color?: number;

	footer?: {
		text: string; // Footer text (max 2048 characters)
		icon_url?: string;
	};

	image?: {
		url: string;
	};

	thumbnail?: {
		url: string;
	};

	author?: {
		name: string; // Name of the author (max 256 characters)
		url?: string;
		icon_url?: string;
	};

	fields?: IDiscordEmbedField[];
}

/**
 * Value type of every field a webhook execution body may carry, keyed by its
 * wire name.
 */
export interface ExecuteWebhookFields {
	content: string;
	username: string;
	avatar_url: string;
	tts: boolean;
	embeds: IDiscordEmbed[];
}

export type WebhookField = keyof ExecuteWebhookFields;

export type IDiscordWebhookPayload = Partial<ExecuteWebhookFields>;

export interface IDiscordWebhook {
	id: string;
	type: number;
	guild_id?: string | null;
	channel_id: string | null;
	name: string | null;
	avatar: string | null;
	token?: string;
	application_id: string | null;
}

export interface IDiscordMessage {
	id: string;
	channel_id: string;
	content: string;
	tts: boolean;
	timestamp: string;
	embeds: IDiscordEmbed[];
	webhook_id?: string;
}
