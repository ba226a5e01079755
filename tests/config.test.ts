import type { PlatformConfig } from 'homebridge';
import { describe, expect, it } from 'vitest';

import { DEFAULT_API_BASE } from '../src/petkit/api-client.js';
import { parsePlatformConfig } from '../src/petkit/config.js';
import { silentLogger } from './helpers.js';

function platformConfig(fields: Omit<PlatformConfig, 'platform'>): PlatformConfig {
	return { ...fields, platform: 'PetkitFeeder' };
}

describe('parsePlatformConfig', () => {
	it('reads a single top-level account with defaults', () => {
		const accounts = parsePlatformConfig(
			platformConfig({ username: 'owner@example.com', password: 'test-secret' }),
			silentLogger(),
		);

		expect(accounts).toEqual([
			{
				username: 'owner@example.com',
				password: 'test-secret',
				token: undefined,
				apiBase: DEFAULT_API_BASE,
				pollingIntervalSec: 120,
				feedAmount: 1,
			},
		]);
	});

	it('accepts email as the username and a token instead of a password', () => {
		const [account] = parsePlatformConfig(
			platformConfig({ email: ' owner@example.com ', token: 'test-token' }),
			silentLogger(),
		);

		expect(account.username).toBe('owner@example.com');
		expect(account.password).toBe('');
		expect(account.token).toBe('test-token');
	});

	it('lets accounts inherit top-level settings', () => {
		const accounts = parsePlatformConfig(
			platformConfig({
				apiBase: 'http://api.petkit.test/6/',
				pollingInterval: '300',
				feedAmount: 2,
				accounts: [
					{ username: 'a@example.com', password: 'test-secret' },
					{ username: 'b@example.com', password: 'test-secret', pollingInterval: 60, feedAmount: 0.5 },
				],
			}),
			silentLogger(),
		);

		expect(accounts.map((a) => [a.username, a.apiBase, a.pollingIntervalSec, a.feedAmount])).toEqual([
			['a@example.com', 'http://api.petkit.test/6/', 300, 2],
			['b@example.com', 'http://api.petkit.test/6/', 60, 0.5],
		]);
	});

	it('puts listed accounts before the top-level one', () => {
		const accounts = parsePlatformConfig(
			platformConfig({
				username: 'top@example.com',
				password: 'test-secret',
				accounts: [{ username: 'listed@example.com', password: 'test-secret' }],
			}),
			silentLogger(),
		);

		expect(accounts.map((a) => a.username)).toEqual(['listed@example.com', 'top@example.com']);
	});

	it('clamps the polling interval to ten seconds', () => {
		const [account] = parsePlatformConfig(
			platformConfig({ username: 'owner@example.com', password: 'test-secret', pollingInterval: 1 }),
			silentLogger(),
		);

		expect(account.pollingIntervalSec).toBe(10);
	});

	it('skips unusable and duplicate entries with a warning', () => {
		const log = silentLogger();
		const accounts = parsePlatformConfig(
			platformConfig({
				accounts: [
					'nope',
					{ username: 'nopass@example.com' },
					{ password: 'test-secret' },
					{ username: 'dup@example.com', password: 'first' },
					{ username: 'dup@example.com', password: 'second' },
				],
			}),
			log,
		);

		expect(accounts).toHaveLength(1);
		expect(accounts[0].password).toBe('first');
		expect(log.warn).toHaveBeenCalledTimes(4);
		expect(log.warn).toHaveBeenCalledWith('Petkit: ignoring malformed entry in "accounts"');
		expect(log.warn).toHaveBeenCalledWith(
			'Petkit: account %s configured twice; using the first entry.',
			'dup@example.com',
		);
	});

	it('returns nothing when no credentials are configured', () => {
		expect(parsePlatformConfig(platformConfig({}), silentLogger())).toEqual([]);
	});
});
