const status = {
	OK: 200,
	NO_CONTENT: 204,
	BAD_REQUEST: 400,
	UNAUTHORIZED: 401,
	FORBIDDEN: 403,
	NOT_FOUND: 404,
	PAYLOAD_TOO_LARGE: 413,
	TOO_MANY_REQUESTS: 429,
	INTERNAL_SERVER_ERROR: 500,
	BAD_GATEWAY: 502,
	SERVICE_UNAVAILABLE: 503,
} as const;

export type StatusName = keyof typeof status;

function isStatusName(key: string): key is StatusName {
	return key in status;
}

export function statusName(code: number): StatusName | 'UNKNOWN' {
	for (const name of Object.keys(status)) {
		if (isStatusName(name) && status[name] === code) {
			return name;
		}
	}

	return 'UNKNOWN';
}

export default status;
