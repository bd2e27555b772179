import { SentryWrapper, type SentryClient } from '../types/SentryClient.js';
import status, { statusName } from '../types/status.js';

export interface ApiException {
	code: number;
	name: string;
	message: string;
	[key: string]: unknown;
}

let sentry: SentryClient = SentryWrapper;

export function setSentryClient(client: SentryClient) {
	sentry = client;
}

export function isApiException(e: unknown): e is ApiException {
	return typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'number';
}

export function throwException(
	code: number,
	msg?: string,
	options?: Record<string, unknown>,
): never {
	const exception: ApiException = {
		...options,
		code: code,
		name: `${code} - ${statusName(code)}`,
		message: msg || '',
	};

	throw exception;
}

export function throwBadRequestException(msg?: string, options?: Record<string, unknown>): never {
	throwException(status.BAD_REQUEST, msg, options);
}

export function throwNotFoundException(msg?: string, options?: Record<string, unknown>): never {
	throwException(status.NOT_FOUND, msg, options);
}

export function throwTooManyRequestsException(
	msg?: string,
	options?: Record<string, unknown>,
): never {
	throwException(status.TOO_MANY_REQUESTS, msg, options);
}

// Status-coded exceptions are expected API outcomes, not faults worth reporting.
export function logException(e: unknown) {
	if (isApiException(e)) {
		return;
	}

	sentry.captureException(e);
}
