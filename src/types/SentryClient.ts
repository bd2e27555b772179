import * as Sentry from '@sentry/node';

export interface SentryClient {
	captureException(e: unknown): void;
}

export const SentryWrapper: SentryClient = {
	captureException: (e: unknown) => {
		Sentry.captureException(e);
	},
};

export const NoOpSentryWrapper: SentryClient = {
	captureException: () => {},
};
