import type { IDiscordEmbed, IDiscordEmbedField } from '../types/Discord.js';

export function colorFromRgb(r: number, g: number, b: number): number {
	return ((r & 0xff) << 16) | ((g & 0xff) << 8) | (b & 0xff);
}

/**
 * Builds a single rich embed to pass to {@link ExecuteWebhook.embeds}.
 * Discord's size limits are not checked here.
 */
export class CreateEmbed {
	private readonly embed: IDiscordEmbed = { type: 'rich' };
	private readonly embedFields: IDiscordEmbedField[] = [];

	title(title: string): this {
		this.embed.title = title;
		return this;
	}

	description(description: string): this {
		this.embed.description = description;
		return this;
	}

	url(url: string): this {
		this.embed.url = url;
		return this;
	}

	timestamp(timestamp: Date | string): this {
		this.embed.timestamp = typeof timestamp === 'string' ? timestamp : timestamp.toISOString();
		return this;
	}

	color(color: number): this;
	color(r: number, g: number, b: number): this;
	color(colorOrRed: number, g?: number, b?: number): this {
		this.embed.color =
			g === undefined || b === undefined ? colorOrRed : colorFromRgb(colorOrRed, g, b);
		return this;
	}

	/** Appends a field; fields render in the order they are added. */
	field(name: string, value: string, inline = false): this {
		this.embedFields.push({ name, value, inline });
		return this;
	}

	footer(text: string, iconUrl?: string): this {
		this.embed.footer = iconUrl ? { text, icon_url: iconUrl } : { text };
		return this;
	}

	author(name: string, url?: string, iconUrl?: string): this {
		this.embed.author = { name };
		if (url) this.embed.author.url = url;
		if (iconUrl) this.embed.author.icon_url = iconUrl;
		return this;
	}

	image(url: string): this {
		this.embed.image = { url };
		return this;
	}

	thumbnail(url: string): this {
		this.embed.thumbnail = { url };
		return this;
	}

	build(): IDiscordEmbed {
		if (this.embedFields.length === 0) {
			return { ...this.embed };
		}

		return { ...this.embed, fields: this.embedFields.map((f) => ({ ...f })) };
	}
}
