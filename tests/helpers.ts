import { vi } from 'vitest';

import type { ApiResult, PetkitLogger, PetkitResponse } from '../src/petkit/api-client.js';
import { TransportError } from '../src/petkit/errors.js';

export function silentLogger(): PetkitLogger & {
	debug: ReturnType<typeof vi.fn>;
	info: ReturnType<typeof vi.fn>;
	warn: ReturnType<typeof vi.fn>;
	error: ReturnType<typeof vi.fn>;
} {
	return {
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	};
}

export function okResult(body: PetkitResponse): ApiResult {
	return { ok: true, body };
}

export function failedResult(message = 'socket hang up'): ApiResult {
	return { ok: false, error: new TransportError(message, 'GET', 'http://petkit.test/6/x') };
}

export function loginResult(id: string, userId: string | number = 'u-1'): ApiResult {
	return okResult({ result: { session: { id, userId } } });
}

export function rosterResult(devices: unknown[]): ApiResult {
	return okResult({ result: { devices } });
}

export function rosterEntry(
	id: string | number,
	type: string,
	data: Record<string, unknown> = {},
): Record<string, unknown> {
	return { type, data: { id, ...data } };
}
