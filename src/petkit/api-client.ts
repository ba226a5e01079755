// src/petkit/api-client.ts
// Petkit cloud HTTP client.
// Attaches the fixed app headers and the current session token to every call
// and turns transport failures into a failed ApiResult instead of throwing.
//
// SessionManager owns the token and pushes it in through setToken().

import { TransportError } from './errors.js';

export const DEFAULT_API_BASE = 'http://api.petkit.cn/6/';

/** Vendor error code meaning the X-Session token is no longer accepted. */
export const SESSION_EXPIRED_CODE = 5;

const REQUEST_TIMEOUT_MS = 20_000;

const FIXED_HEADERS: Readonly<Record<string, string>> = {
	'User-Agent': 'okhttp/3.12.1',
	'X-Api-Version': '7.29.1',
	'X-Client': 'Android(7.1.1;MP1602)',
};

/**
 * `POST_GET` is sent as POST but keeps the params in the query string,
 * which is what the login endpoint expects.
 */
export type ApiMethod = 'GET' | 'POST' | 'POST_GET' | 'PUT' | 'DELETE';

export type ApiParams = Record<string, string | number>;

export interface PetkitResponseError {
	code?: number | string;
	msg?: string;
}

export interface PetkitResponse {
	error?: PetkitResponseError;
	result?: unknown;
}

export type ApiResult =
	| { ok: true; body: PetkitResponse }
	| { ok: false; error: TransportError };

/**
 * Very small logger interface so we can accept either the Homebridge log
 * object or console.* functions in tests.
 */
export interface PetkitLogger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

export function createConsoleLogger(tag: string): PetkitLogger {
	return {
		debug: (...args: unknown[]) => console.debug(`[${tag}]`, ...args),
		info: (...args: unknown[]) => console.info(`[${tag}]`, ...args),
		warn: (...args: unknown[]) => console.warn(`[${tag}]`, ...args),
		error: (...args: unknown[]) => console.error(`[${tag}]`, ...args),
	};
}

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The `result` payload of a response, or an empty object on any failure. */
export function resultOf(result: ApiResult): Record<string, unknown> {
	if (!result.ok) {
		return {};
	}
	return isRecord(result.body.result) ? result.body.result : {};
}

/** Embedded vendor error code; 0 for success and for failed transports. */
export function errorCodeOf(result: ApiResult): number {
	if (!result.ok) {
		return 0;
	}
	const code = Number(result.body.error?.code ?? 0);
	return Number.isFinite(code) ? code : 0;
}

function toPetkitResponse(json: unknown): PetkitResponse {
	if (!isRecord(json)) {
		return {};
	}
	const response: PetkitResponse = { result: json.result };
	const error = json.error;
	if (isRecord(error)) {
		response.error = {
			code: typeof error.code === 'number' || typeof error.code === 'string' ? error.code : undefined,
			msg: typeof error.msg === 'string' ? error.msg : undefined,
		};
	}
	return response;
}

export function joinApiUrl(apiBase: string, path: string): string {
	return `${apiBase.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

export class ApiClient {
	private readonly log: PetkitLogger;
	private token = '';

	public constructor(
		private readonly apiBase: string = DEFAULT_API_BASE,
		logger?: PetkitLogger,
	) {
		this.log = logger ?? createConsoleLogger('petkit-api');
	}

	public setToken(token: string): void {
		this.token = token;
	}

	public getToken(): string {
		return this.token;
	}

	public async call(
		path: string,
		params: ApiParams = {},
		method: ApiMethod = 'GET',
	): Promise<ApiResult> {
		const url = new URL(joinApiUrl(this.apiBase, path));
		const verb = method === 'POST_GET' ? 'POST' : method;
		const headers: Record<string, string> = {
			...FIXED_HEADERS,
			'X-Session': this.token,
		};

		const form = new URLSearchParams();
		for (const [key, value] of Object.entries(params)) {
			form.append(key, String(value));
		}

		let body: string | undefined;
		if (method === 'GET' || method === 'POST_GET') {
			form.forEach((value, key) => url.searchParams.append(key, value));
		} else {
			headers['Content-Type'] = 'application/x-www-form-urlencoded';
			body = form.toString();
		}

		this.log.debug('Petkit: %s %s', verb, url.pathname);

		try {
			const res = await fetch(url, {
				method: verb,
				headers,
				body,
				signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
			});
			const json: unknown = await res.json();
			return { ok: true, body: toPetkitResponse(json) };
		} catch (err) {
			const error = new TransportError(
				`Petkit request ${verb} ${path} failed: ${err instanceof Error ? err.message : String(err)}`,
				verb,
				`${url.origin}${url.pathname}`,
				{ cause: err },
			);
			this.log.error('Petkit: request failed: %s', error.message);
			return { ok: false, error };
		}
	}
}
