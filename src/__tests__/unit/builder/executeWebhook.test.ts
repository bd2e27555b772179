import { describe, expect, it } from 'vitest';
import { ExecuteWebhook, isWebhookField } from '../../../builder/executeWebhook.js';
import type { IDiscordEmbed } from '../../../types/Discord.js';

const releaseEmbed: IDiscordEmbed = { title: 'Release notes', color: 0x5865f2 };
const resourcesEmbed: IDiscordEmbed = {
	title: 'Resources',
	fields: [{ name: 'Guide', value: 'Read the guide', inline: false }],
};

describe('ExecuteWebhook', () => {
	describe('default', () => {
		it('should contain only tts set to false', () => {
			const webhook = ExecuteWebhook.default();

			expect(webhook.size).toBe(1);
			expect(webhook.fields()).toEqual(['tts']);
			expect(webhook.get('tts')).toBe(false);
			expect(webhook.toJSON()).toEqual({ tts: false });
		});

		it('should match the constructor', () => {
			expect(new ExecuteWebhook().toJSON()).toEqual(ExecuteWebhook.default().toJSON());
		});

		it('should serialize to a body with tts only', () => {
			expect(JSON.stringify(ExecuteWebhook.default())).toBe('{"tts":false}');
		});
	});

	describe('setters', () => {
		it('should store each field under its wire name', () => {
			const webhook = ExecuteWebhook.default()
				.content('hello')
				.username('Announcer')
				.avatarUrl('https://example.com/avatar.png')
				.embeds([releaseEmbed]);

			expect(webhook.toJSON()).toEqual({
				tts: false,
				content: 'hello',
				username: 'Announcer',
				avatar_url: 'https://example.com/avatar.png',
				embeds: [releaseEmbed],
			});
		});

		it('should keep a single entry when a field is set twice', () => {
			const webhook = ExecuteWebhook.default().username('first').username('second');

			expect(webhook.get('username')).toBe('second');
			expect(webhook.fields()).toEqual(['tts', 'username']);
			expect(webhook.size).toBe(2);
		});

		it('should not alter other fields', () => {
			const webhook = ExecuteWebhook.default().content('hello').avatarUrl('https://a.test/x.png');

			webhook.username('bot');

			expect(webhook.get('content')).toBe('hello');
			expect(webhook.get('avatar_url')).toBe('https://a.test/x.png');
			expect(webhook.get('tts')).toBe(false);
		});

		it('should work without chaining', () => {
			const webhook = ExecuteWebhook.default();
			webhook.content('sequential');
			webhook.tts(true);

			expect(webhook.toJSON()).toEqual({ tts: true, content: 'sequential' });
		});
	});

	describe('ordering', () => {
		it('should preserve first-set order for distinct fields', () => {
			const webhook = ExecuteWebhook.default()
				.username('bot')
				.embeds([])
				.content('hi')
				.avatarUrl('https://a.test/x.png');

			expect(webhook.fields()).toEqual(['tts', 'username', 'embeds', 'content', 'avatar_url']);
		});

		it('should keep the original slot when a field is overwritten', () => {
			const webhook = ExecuteWebhook.default()
				.content('hello')
				.tts(true)
				.content('hello again');

			expect(webhook.entries()).toEqual([
				['tts', true],
				['content', 'hello again'],
			]);
			expect(JSON.stringify(webhook)).toBe('{"tts":true,"content":"hello again"}');
		});

		it('should keep the slot of a later field on overwrite', () => {
			const webhook = ExecuteWebhook.default().content('a').username('b').content('c');

			expect(webhook.fields()).toEqual(['tts', 'content', 'username']);
			expect(webhook.get('content')).toBe('c');
		});
	});

	describe('embeds', () => {
		it('should replace rather than append', () => {
			const webhook = ExecuteWebhook.default().embeds([releaseEmbed, resourcesEmbed]).embeds([]);

			expect(webhook.get('embeds')).toEqual([]);
			expect(webhook.has('embeds')).toBe(true);
		});

		it('should not share the array passed in', () => {
			const embeds = [releaseEmbed];
			const webhook = ExecuteWebhook.default().embeds(embeds);

			embeds.push(resourcesEmbed);

			expect(webhook.get('embeds')).toEqual([releaseEmbed]);
		});
	});

	describe('toJSON', () => {
		it('should return a copy that does not write back into the builder', () => {
			const webhook = ExecuteWebhook.default();
			const payload = webhook.toJSON();

			payload.content = 'mutated';

			expect(webhook.has('content')).toBe(false);
		});

		it('should not expose the stored embeds array', () => {
			const webhook = ExecuteWebhook.default().embeds([]);

			webhook.toJSON().embeds?.push({ title: 'from toJSON' });
			webhook.get('embeds')?.push({ title: 'from get' });
			for (const [, value] of webhook.entries()) {
				if (Array.isArray(value)) value.push({ title: 'from entries' });
			}

			expect(webhook.get('embeds')).toEqual([]);
			expect(JSON.stringify(webhook)).toBe('{"tts":false,"embeds":[]}');
		});
	});

	describe('isWebhookField', () => {
		it('should accept the five field names only', () => {
			expect(['content', 'username', 'avatar_url', 'tts', 'embeds'].every(isWebhookField)).toBe(
				true,
			);
			expect(isWebhookField('avatarUrl')).toBe(false);
			expect(isWebhookField('file')).toBe(false);
		});
	});
});
