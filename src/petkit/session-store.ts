// src/petkit/session-store.ts
import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import { isRecord } from './api-client.js';

export interface StoredSession {
	username: string;
	apiBase: string;
	token: string;
	userId: string;
	/** When the token last changed (ISO-8601). */
	updateAt: string;
}

/**
 * Key-value persistence for sessions, scoped by account username.
 */
export interface SessionStore {
	load(username: string): Promise<StoredSession | null>;
	save(session: StoredSession): Promise<void>;
}

function toStoredSession(raw: unknown): StoredSession | null {
	if (!isRecord(raw) || typeof raw.token !== 'string' || raw.token.length === 0) {
		return null;
	}
	return {
		username: typeof raw.username === 'string' ? raw.username : '',
		apiBase: typeof raw.apiBase === 'string' ? raw.apiBase : '',
		token: raw.token,
		userId: raw.userId === undefined || raw.userId === null ? '' : String(raw.userId),
		updateAt: typeof raw.updateAt === 'string' ? raw.updateAt : '',
	};
}

/**
 * Simple JSON session store under the Homebridge storage path.
 *
 * Files are stored at:
 *   <storagePath>/homebridge-petkit-feeder/auth-<encoded username>.json
 */
export class FileSessionStore implements SessionStore {
	private readonly dirPath: string;

	public constructor(storagePath: string) {
		this.dirPath = path.join(storagePath, 'homebridge-petkit-feeder');
	}

	/** Percent-encoded, so distinct usernames never share a file. */
	public filePathFor(username: string): string {
		return path.join(this.dirPath, `auth-${encodeURIComponent(username)}.json`);
	}

	public async load(username: string): Promise<StoredSession | null> {
		let raw: string;
		try {
			raw = await fs.readFile(this.filePathFor(username), 'utf8');
		} catch (err) {
			if (isRecord(err) && err.code === 'ENOENT') {
				return null;
			}
			throw err;
		}

		try {
			return toStoredSession(JSON.parse(raw));
		} catch {
			// corrupt file → behave as if nothing was stored
			return null;
		}
	}

	public async save(session: StoredSession): Promise<void> {
		const json = JSON.stringify(session, null, 2);

		// Ensure directory exists before writing
		await fs.mkdir(this.dirPath, { recursive: true });
		await fs.writeFile(this.filePathFor(session.username), json, 'utf8');
	}
}

/**
 * Process-local store; used when no storage path is available and in tests.
 */
export class MemorySessionStore implements SessionStore {
	private readonly sessions = new Map<string, StoredSession>();

	public async load(username: string): Promise<StoredSession | null> {
		const stored = this.sessions.get(username);
		return stored ? { ...stored } : null;
	}

	public async save(session: StoredSession): Promise<void> {
		this.sessions.set(session.username, { ...session });
	}
}
