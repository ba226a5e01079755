// src/petkit/coordinator.ts
import {
	ApiClient,
	SESSION_EXPIRED_CODE,
	createConsoleLogger,
	errorCodeOf,
	isRecord,
	resultOf,
	type ApiResult,
	type PetkitLogger,
} from './api-client.js';
import { toDeviceData, type PetkitDevice, type PetkitDeviceData } from './device.js';
import type { DeviceRegistry } from './device-registry.js';
import type { EntityBinder } from './entity-binder.js';
import type { SessionManager } from './session-manager.js';

export const ROSTER_PATH = 'discovery/device_roster';

export interface PollingCoordinatorOptions {
	intervalMs: number;
	logger?: PetkitLogger;
}

export interface RosterEntry {
	id: string;
	data: PetkitDeviceData;
}

/**
 * Pull `result.devices` out of a roster response. Entries without a data id
 * are dropped; the roster `type` is folded into the data block.
 */
export function parseRoster(rsp: ApiResult): RosterEntry[] {
	const devices = resultOf(rsp).devices;
	if (!Array.isArray(devices)) {
		return [];
	}

	const entries: RosterEntry[] = [];
	for (const dvc of devices) {
		if (!isRecord(dvc) || !isRecord(dvc.data)) {
			continue;
		}
		const did = dvc.data.id;
		if ((typeof did !== 'string' && typeof did !== 'number') || did === '' || did === 0) {
			continue;
		}
		entries.push({
			id: String(did),
			data: toDeviceData(dvc.data, typeof dvc.type === 'string' ? dvc.type : ''),
		});
	}
	return entries;
}

/**
 * Drives one account: fetch the roster, re-login once on an expired session,
 * upsert every device and make sure its entities exist.
 *
 * Ticks never overlap: the next one is only scheduled after the previous one
 * has settled.
 */
export class PollingCoordinator {
	private readonly log: PetkitLogger;
	private timer: ReturnType<typeof setTimeout> | null = null;
	private running = false;
	/** Bumped by stop() so a chain from before it never re-arms. */
	private generation = 0;
	private inFlight: Promise<void> | null = null;

	public constructor(
		private readonly client: ApiClient,
		private readonly session: SessionManager,
		private readonly registry: DeviceRegistry,
		private readonly binder: EntityBinder,
		private readonly options: PollingCoordinatorOptions,
	) {
		this.log = options.logger ?? createConsoleLogger('petkit-coordinator');
	}

	public get isRunning(): boolean {
		return this.running;
	}

	/** First refresh, awaited, then the periodic loop. */
	public async start(): Promise<void> {
		if (this.running) {
			return;
		}
		this.running = true;
		const generation = this.generation;
		await this.refresh();
		this.scheduleNext(generation);
	}

	/** Cancels the pending tick; one already in flight is left to finish. */
	public stop(): void {
		this.running = false;
		this.generation += 1;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
	}

	/**
	 * One tick. Never rejects; failures are logged and the registry keeps its
	 * last known state. Concurrent callers share the tick in flight.
	 */
	public refresh(): Promise<void> {
		if (!this.inFlight) {
			this.inFlight = this.runTick().finally(() => {
				this.inFlight = null;
			});
		}
		return this.inFlight;
	}

	private async runTick(): Promise<void> {
		try {
			const rsp = await this.fetchRoster();
			const entries = parseRoster(rsp);

			if (entries.length === 0) {
				this.log.warn(
					'Petkit: got no devices for %s: %s',
					this.session.username,
					rsp.ok ? JSON.stringify(rsp.body) : rsp.error.message,
				);
				return;
			}

			const touched: PetkitDevice[] = [];
			for (const entry of entries) {
				touched.push(this.registry.upsert(entry.id, entry.data));
			}
			for (const device of touched) {
				this.binder.bindAll(device);
			}
		} catch (err) {
			this.log.error(
				'Petkit: refresh for %s failed: %s',
				this.session.username,
				err instanceof Error ? err.message : String(err),
			);
		}
	}

	private async fetchRoster(): Promise<ApiResult> {
		const rsp = await this.client.call(ROSTER_PATH);
		if (errorCodeOf(rsp) !== SESSION_EXPIRED_CODE) {
			return rsp;
		}

		this.log.warn('Petkit: session for %s expired; logging in again.', this.session.username);
		try {
			await this.session.login();
		} catch (err) {
			this.log.error(
				'Petkit: re-login for %s failed: %s',
				this.session.username,
				err instanceof Error ? err.message : String(err),
			);
			return rsp;
		}
		return await this.client.call(ROSTER_PATH);
	}

	private scheduleNext(generation: number): void {
		if (!this.running || generation !== this.generation) {
			return;
		}
		this.timer = setTimeout(() => {
			this.timer = null;
			void this.refresh().then(() => this.scheduleNext(generation));
		}, this.options.intervalMs);
	}
}
