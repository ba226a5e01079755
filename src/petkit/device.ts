// src/petkit/device.ts
import {
	ApiClient,
	createConsoleLogger,
	isRecord,
	type ApiParams,
	type ApiResult,
	type PetkitLogger,
} from './api-client.js';
import type { CapabilityMap } from './capabilities.js';

/**
 * One roster entry's `data` block with the roster `type` folded in.
 * Only the fields read here are typed; everything else is kept opaque.
 */
export interface PetkitDeviceData {
	id?: string | number;
	type?: string;
	name?: string;
	state?: number | string;
	desc?: string;
	deviceShared?: unknown;
	status?: PetkitDeviceStatus;
	[key: string]: unknown;
}

export interface PetkitDeviceStatus {
	desiccantLeftDays?: number | string;
	/** 0 while the hopper is fine, anything else means low or empty. */
	food?: number | string;
	errorMsg?: string;
	[key: string]: unknown;
}

export type DeviceListener = (device: PetkitDevice) => void;

export interface Subscription {
	unsubscribe(): void;
}

const STATE_LABELS: ReadonlyMap<string, string> = new Map([
	['1', 'online'],
	['2', 'offline'],
	['3', 'feeding'],
	['4', 'mate_ota'],
	['5', 'device_error'],
	['6', 'battery_mode'],
]);

function toDeviceStatus(raw: Record<string, unknown>): PetkitDeviceStatus {
	const status: PetkitDeviceStatus = {};
	for (const [key, value] of Object.entries(raw)) {
		status[key] = value;
	}
	const { desiccantLeftDays, food, errorMsg } = raw;
	status.desiccantLeftDays =
		typeof desiccantLeftDays === 'number' || typeof desiccantLeftDays === 'string' ? desiccantLeftDays : undefined;
	status.food = typeof food === 'number' || typeof food === 'string' ? food : undefined;
	status.errorMsg = typeof errorMsg === 'string' ? errorMsg : undefined;
	return status;
}

/**
 * Narrow a roster `data` block. Unknown fields are kept as they are; the
 * roster-level `type` replaces any `type` inside the block.
 */
export function toDeviceData(raw: Record<string, unknown>, type: string): PetkitDeviceData {
	const data: PetkitDeviceData = {};
	for (const [key, value] of Object.entries(raw)) {
		data[key] = value;
	}
	const { id, name, state, desc, status } = raw;
	data.id = typeof id === 'number' || typeof id === 'string' ? id : undefined;
	data.type = type;
	data.name = typeof name === 'string' ? name : undefined;
	data.state = typeof state === 'number' || typeof state === 'string' ? state : undefined;
	data.desc = typeof desc === 'string' ? desc : undefined;
	data.status = isRecord(status) ? toDeviceStatus(status) : undefined;
	return data;
}

/** Local calendar day as YYYYMMDD, the format save_dailyfeed expects. */
export function formatFeedDay(date: Date): string {
	const y = String(date.getFullYear()).padStart(4, '0');
	const m = String(date.getMonth() + 1).padStart(2, '0');
	const d = String(date.getDate()).padStart(2, '0');
	return `${y}${m}${d}`;
}

export function feedPathForType(type: string): string {
	switch (type) {
	case 'feedermini':
		return 'feedermini/save_dailyfeed';
	case 'd3':
	case 'd4':
		return `${type}/saveDailyFeed`;
	default:
		return 'feeder/save_dailyfeed';
	}
}

export class PetkitDevice {
	public readonly capabilities: CapabilityMap;
	private data: PetkitDeviceData = {};
	private readonly listeners = new Set<{ fn: DeviceListener }>();
	private readonly log: PetkitLogger;

	public constructor(
		public readonly id: string,
		data: PetkitDeviceData,
		private readonly client: ApiClient,
		logger?: PetkitLogger,
	) {
		this.log = logger ?? createConsoleLogger('petkit-device');
		this.capabilities = this.buildCapabilities();
		this.updateData(data);
	}

	/**
	 * Replace the whole state blob and notify every listener synchronously.
	 * Fields missing from `data` are gone after this call.
	 */
	public updateData(data: PetkitDeviceData): void {
		this.data = data;
		this.log.debug('Petkit: device %s (%s) updated: state=%s', this.id, this.type, String(this.state));
		for (const entry of [...this.listeners]) {
			entry.fn(this);
		}
	}

	public subscribe(listener: DeviceListener): Subscription {
		// Wrapped so the same function can be registered twice and removed once.
		const entry = { fn: listener };
		this.listeners.add(entry);
		return {
			unsubscribe: () => {
				this.listeners.delete(entry);
			},
		};
	}

	public get listenerCount(): number {
		return this.listeners.size;
	}

	public get type(): string {
		return typeof this.data.type === 'string' ? this.data.type.toLowerCase() : '';
	}

	public get name(): string {
		return typeof this.data.name === 'string' ? this.data.name : '';
	}

	/** Activity label, or the raw code when it is not a known one. */
	public get state(): string | number {
		const sta = this.data.state || 0;
		return STATE_LABELS.get(String(sta).trim()) ?? sta;
	}

	public get status(): PetkitDeviceStatus {
		return isRecord(this.data.status) ? this.data.status : {};
	}

	public get desiccant(): number {
		const days = Number(this.status.desiccantLeftDays || 0);
		return Number.isFinite(days) ? days : 0;
	}

	/** True while the food level is normal (status code 0 or absent). */
	public get foodPresent(): boolean {
		return Number(this.status.food ?? 0) === 0;
	}

	/**
	 * Dispense `amount` portions right now. The API takes tenths.
	 * Failures are logged and come back in the result, never thrown.
	 */
	public async feedNow(amount = 1): Promise<ApiResult> {
		const params: ApiParams = {
			deviceId: this.id,
			day: formatFeedDay(new Date()),
			time: -1,
			amount: Math.round(amount * 10),
		};

		const rsp = await this.client.call(feedPathForType(this.type), params);
		if (rsp.ok) {
			this.log.info('Petkit: feeding now on %s: %o', this.id, rsp.body);
		} else {
			this.log.warn('Petkit: feeding now on %s failed: %s', this.id, rsp.error.message);
		}
		return rsp;
	}

	private buildCapabilities(): CapabilityMap {
		return {
			sensor: [
				{
					domain: 'sensor',
					name: 'state',
					read: () => this.state,
					attributes: () => ({
						state: this.data.state,
						desc: this.data.desc,
						status: this.status,
						shared: this.data.deviceShared,
					}),
				},
				{
					domain: 'sensor',
					name: 'desiccant',
					unit: 'days',
					read: () => this.desiccant,
				},
			],
			binary_sensor: [
				{
					domain: 'binary_sensor',
					name: 'food_state',
					icon: 'mdi:food-drumstick-outline',
					deviceClass: 'problem',
					read: () => !this.foodPresent,
					attributes: () => ({
						state: this.status.food,
						desc: this.foodPresent ? 'normal' : 'few',
					}),
				},
			],
			switch: [
				{
					domain: 'switch',
					name: 'feeding',
					icon: 'mdi:shaker',
					read: () => this.state === 'feeding',
					attributes: () => ({
						desc: this.data.desc,
						error: this.status.errorMsg,
					}),
					turnOn: (amount?: number) => this.feedNow(amount),
				},
			],
		};
	}
}
