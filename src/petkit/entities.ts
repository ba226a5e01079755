// src/petkit/entities.ts
// Host-agnostic observers. Each one projects a single capability of a device
// and re-reads it whenever the device reports new data.

import type { ApiResult } from './api-client.js';
import type {
	BinarySensorCapability,
	CapabilityByDomain,
	CapabilityDomain,
	SensorCapability,
	StateAttributes,
	SwitchCapability,
} from './capabilities.js';
import { DEFAULT_FEED_AMOUNT } from './config.js';
import type { PetkitDevice, Subscription } from './device.js';

export type EntityChangeListener<E> = (entity: E) => void;

export abstract class PetkitEntity<D extends CapabilityDomain = CapabilityDomain> {
	public abstract readonly domain: D;
	public attributes: StateAttributes = {};
	private subscription: Subscription | null = null;
	private readonly changeListeners: EntityChangeListener<this>[] = [];

	public constructor(
		public readonly device: PetkitDevice,
		public readonly capability: CapabilityByDomain[D],
	) {}

	/** Display name, e.g. `Kitchen Feeder desiccant`. */
	public get name(): string {
		return `${this.device.name} ${this.capability.name}`.trim();
	}

	public get deviceKey(): string {
		return `${this.device.type}_${this.device.id}`;
	}

	public get uniqueId(): string {
		return `${this.deviceKey}-${this.capability.name}`;
	}

	public get icon(): string | undefined {
		return this.capability.icon;
	}

	public get deviceClass(): string | undefined {
		return this.capability.deviceClass;
	}

	public get unit(): string | undefined {
		return this.capability.unit;
	}

	/** Start listening to the device and take an initial reading. */
	public attach(): void {
		if (this.subscription) {
			return;
		}
		this.subscription = this.device.subscribe(() => this.update());
		this.update();
	}

	public onChange(listener: EntityChangeListener<this>): void {
		this.changeListeners.push(listener);
	}

	public update(): void {
		this.refreshState();
		this.attributes = this.capability.attributes?.() ?? {};
		for (const listener of this.changeListeners) {
			listener(this);
		}
	}

	protected abstract refreshState(): void;
}

export class PetkitSensorEntity extends PetkitEntity<'sensor'> {
	public readonly domain = 'sensor';
	public state: string | number = 0;

	public constructor(device: PetkitDevice, capability: SensorCapability) {
		super(device, capability);
	}

	protected refreshState(): void {
		this.state = this.capability.read();
	}
}

export class PetkitBinarySensorEntity extends PetkitEntity<'binary_sensor'> {
	public readonly domain = 'binary_sensor';
	public isOn = false;

	public constructor(device: PetkitDevice, capability: BinarySensorCapability) {
		super(device, capability);
	}

	public get state(): 'on' | 'off' {
		return this.isOn ? 'on' : 'off';
	}

	protected refreshState(): void {
		this.isOn = this.capability.read();
	}
}

export class PetkitSwitchEntity extends PetkitEntity<'switch'> {
	public readonly domain = 'switch';
	public isOn = false;

	public constructor(
		device: PetkitDevice,
		capability: SwitchCapability,
		private readonly amount: number = DEFAULT_FEED_AMOUNT,
	) {
		super(device, capability);
	}

	public get state(): 'on' | 'off' {
		return this.isOn ? 'on' : 'off';
	}

	public async turnOn(): Promise<ApiResult> {
		return await this.capability.turnOn(this.amount);
	}

	protected refreshState(): void {
		this.isOn = this.capability.read();
	}
}

export type AnyPetkitEntity = PetkitSensorEntity | PetkitBinarySensorEntity | PetkitSwitchEntity;
