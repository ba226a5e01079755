// src/petkit/session-manager.ts
import { createHash } from 'node:crypto';

import {
	ApiClient,
	createConsoleLogger,
	isRecord,
	resultOf,
	type PetkitLogger,
} from './api-client.js';
import type { PetkitAccountConfig } from './config.js';
import { AuthError } from './errors.js';
import type { SessionStore, StoredSession } from './session-store.js';

const MD5_HEX = /^[0-9a-f]{32}$/i;

export interface Session {
	token: string;
	userId: string;
}

/**
 * MD5 hex digest of the password. A value that already is a 32 digit hex
 * string is taken to be hashed and returned as-is, so hashing is idempotent.
 */
export function hashPassword(password: string): string {
	if (MD5_HEX.test(password)) {
		return password;
	}
	return createHash('md5').update(password).digest('hex');
}

export class SessionManager {
	private readonly log: PetkitLogger;
	private session: Session | null = null;

	public constructor(
		private readonly config: Pick<PetkitAccountConfig, 'username' | 'password' | 'token' | 'apiBase'>,
		private readonly client: ApiClient,
		private readonly store: SessionStore,
		logger?: PetkitLogger,
	) {
		this.log = logger ?? createConsoleLogger('petkit-session');
	}

	public get current(): Session | null {
		return this.session;
	}

	public get username(): string {
		return this.config.username;
	}

	/**
	 * Log in with the hashed password and persist the new session.
	 * Rejects with AuthError when the response has no session id.
	 */
	public async login(): Promise<Session> {
		const { username, password } = this.config;
		if (!password) {
			throw new AuthError(`Petkit login for ${username} needs a password`);
		}

		this.log.debug('Petkit: logging in as %s…', username);

		const rsp = await this.client.call(
			'user/login',
			{
				encrypt: 1,
				username,
				password: hashPassword(password),
				oldVersion: '',
			},
			'POST_GET',
		);

		const ssn = resultOf(rsp).session;
		const sid = isRecord(ssn) ? ssn.id : undefined;
		if ((typeof sid !== 'string' && typeof sid !== 'number') || sid === '') {
			const detail = rsp.ok ? rsp.body.error?.msg ?? 'no session in response' : rsp.error.message;
			this.log.error('Petkit: login %s failed: %s', username, detail);
			throw new AuthError(`Petkit login for ${username} failed: ${detail}`, rsp.ok ? rsp.body : undefined);
		}

		const userId = isRecord(ssn) && ssn.userId !== undefined && ssn.userId !== null ? String(ssn.userId) : '';
		this.adopt({ token: String(sid), userId });
		await this.persist();

		this.log.info('Petkit: login successful; userId=%s', userId);
		return { token: String(sid), userId };
	}

	/**
	 * Startup path: the stored token wins, since re-logins keep it fresh. A
	 * token from the config only stands in for token-only accounts; anything
	 * else logs in. A stale token only shows up as code 5 on the first call.
	 */
	public async loadOrLogin(): Promise<Session> {
		const stored = await this.store.load(this.config.username);
		if (stored?.token) {
			this.log.info(
				'Petkit: using stored token for %s (updated %s)',
				this.config.username,
				stored.updateAt || 'unknown',
			);
			this.adopt({ token: stored.token, userId: stored.userId });
			return { token: stored.token, userId: stored.userId };
		}

		if (this.config.token && !this.config.password) {
			this.log.info('Petkit: using token from config for %s', this.config.username);
			this.adopt({ token: this.config.token, userId: '' });
			return { token: this.config.token, userId: '' };
		}

		return await this.login();
	}

	/**
	 * Write the current session. The previous timestamp is kept while the
	 * token is unchanged, so `updateAt` records when the token last changed;
	 * `forceTimestampRefresh` stamps the current time regardless.
	 */
	public async persist(forceTimestampRefresh = false): Promise<StoredSession> {
		if (!this.session) {
			throw new AuthError(`Petkit session for ${this.config.username} not initialised`);
		}

		const old = await this.store.load(this.config.username);
		const updateAt =
			!forceTimestampRefresh && old && old.token === this.session.token && old.updateAt
				? old.updateAt
				: new Date().toISOString();

		const record: StoredSession = {
			username: this.config.username,
			apiBase: this.config.apiBase,
			token: this.session.token,
			userId: this.session.userId,
			updateAt,
		};

		await this.store.save(record);
		return record;
	}

	private adopt(session: Session): void {
		this.session = session;
		this.client.setToken(session.token);
	}
}
