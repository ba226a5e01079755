// src/petkit/config.ts
import type { PlatformConfig } from 'homebridge';

import { DEFAULT_API_BASE, isRecord, type PetkitLogger } from './api-client.js';

export const DEFAULT_POLLING_INTERVAL_SEC = 120;
export const MIN_POLLING_INTERVAL_SEC = 10;
export const DEFAULT_FEED_AMOUNT = 1;

export interface PetkitAccountConfig {
	username: string;
	/** Clear text or an MD5 hex digest; hashed before it leaves the process. */
	password: string;
	/** Pre-issued X-Session token; skips the first login when set. */
	token?: string;
	apiBase: string;
	pollingIntervalSec: number;
	feedAmount: number;
}

function readString(raw: Record<string, unknown>, key: string): string | undefined {
	const value = raw[key];
	return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

function readNumber(raw: Record<string, unknown>, key: string): number | undefined {
	const value = raw[key];
	if (typeof value === 'number' && Number.isFinite(value)) {
		return value;
	}
	if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
		return Number(value);
	}
	return undefined;
}

/**
 * Turn the untyped Homebridge platform block into account configs.
 *
 * Top-level `username`/`password` describe one account; `accounts` may list
 * more. Account entries inherit `apiBase`, `pollingInterval` and `feedAmount`
 * from the top level.
 */
export function parsePlatformConfig(
	config: PlatformConfig,
	log: PetkitLogger,
): PetkitAccountConfig[] {
	const raw: Record<string, unknown> = { ...config };
	const entries: Record<string, unknown>[] = [];

	if (Array.isArray(raw.accounts)) {
		for (const entry of raw.accounts) {
			if (isRecord(entry)) {
				entries.push(entry);
			} else {
				log.warn('Petkit: ignoring malformed entry in "accounts"');
			}
		}
	}
	if (readString(raw, 'password') || readString(raw, 'token')) {
		entries.push(raw);
	}

	const accounts: PetkitAccountConfig[] = [];
	const seen = new Set<string>();

	for (const entry of entries) {
		const username = readString(entry, 'username') ?? readString(entry, 'email') ?? '';
		const password = readString(entry, 'password') ?? '';
		const token = readString(entry, 'token');

		if (!password && !token) {
			log.warn('Petkit: account %s has neither password nor token; skipping.', username || '(unnamed)');
			continue;
		}
		if (!username) {
			log.warn('Petkit: account without username; skipping.');
			continue;
		}
		if (seen.has(username)) {
			log.warn('Petkit: account %s configured twice; using the first entry.', username);
			continue;
		}
		seen.add(username);

		const interval =
			readNumber(entry, 'pollingInterval') ??
			readNumber(raw, 'pollingInterval') ??
			DEFAULT_POLLING_INTERVAL_SEC;

		accounts.push({
			username,
			password,
			token,
			apiBase: readString(entry, 'apiBase') ?? readString(raw, 'apiBase') ?? DEFAULT_API_BASE,
			pollingIntervalSec: Math.max(interval, MIN_POLLING_INTERVAL_SEC),
			feedAmount: readNumber(entry, 'feedAmount') ?? readNumber(raw, 'feedAmount') ?? DEFAULT_FEED_AMOUNT,
		});
	}

	return accounts;
}
