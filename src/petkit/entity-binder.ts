// src/petkit/entity-binder.ts
import {
	createConsoleLogger,
	type PetkitLogger,
} from './api-client.js';
import { CAPABILITY_DOMAINS, type CapabilityDomain } from './capabilities.js';
import type { PetkitDevice } from './device.js';
import {
	PetkitBinarySensorEntity,
	PetkitSensorEntity,
	PetkitSwitchEntity,
	type AnyPetkitEntity,
} from './entities.js';

/** Receives each batch of newly created entities; never sees one twice. */
export type RegisterEntities = (domain: CapabilityDomain, entities: AnyPetkitEntity[]) => void;

export interface EntityBinderOptions {
	/** Portions dispensed by feeding switches. */
	feedAmount?: number;
	logger?: PetkitLogger;
}

export function bindingKey(domain: CapabilityDomain, capability: string, deviceId: string): string {
	return `${domain}.${capability}.${deviceId}`;
}

export class EntityBinder {
	private readonly bound = new Map<string, AnyPetkitEntity>();
	private readonly log: PetkitLogger;
	private readonly feedAmount?: number;

	public constructor(
		private readonly register: RegisterEntities,
		options: EntityBinderOptions = {},
	) {
		this.log = options.logger ?? createConsoleLogger('petkit-binder');
		this.feedAmount = options.feedAmount;
	}

	public get size(): number {
		return this.bound.size;
	}

	public get(domain: CapabilityDomain, capability: string, deviceId: string): AnyPetkitEntity | undefined {
		return this.bound.get(bindingKey(domain, capability, deviceId));
	}

	/**
	 * Make sure every capability of `domain` on `device` has exactly one
	 * entity. Returns the entities created by this call.
	 */
	public bind(domain: CapabilityDomain, device: PetkitDevice): AnyPetkitEntity[] {
		const created: AnyPetkitEntity[] = [];

		for (const entity of this.createMissing(domain, device)) {
			this.bound.set(bindingKey(domain, entity.capability.name, device.id), entity);
			entity.attach();
			created.push(entity);
		}

		if (created.length > 0) {
			this.log.debug(
				'Petkit: binding %d %s entit%s for device %s',
				created.length,
				domain,
				created.length === 1 ? 'y' : 'ies',
				device.id,
			);
			this.register(domain, created);
		}
		return created;
	}

	public bindAll(device: PetkitDevice): AnyPetkitEntity[] {
		return CAPABILITY_DOMAINS.flatMap((domain) => this.bind(domain, device));
	}

	private createMissing(domain: CapabilityDomain, device: PetkitDevice): AnyPetkitEntity[] {
		const isNew = (name: string): boolean => !this.bound.has(bindingKey(domain, name, device.id));

		switch (domain) {
		case 'sensor':
			return device.capabilities.sensor
				.filter((cap) => isNew(cap.name))
				.map((cap) => new PetkitSensorEntity(device, cap));
		case 'binary_sensor':
			return device.capabilities.binary_sensor
				.filter((cap) => isNew(cap.name))
				.map((cap) => new PetkitBinarySensorEntity(device, cap));
		case 'switch':
			return device.capabilities.switch
				.filter((cap) => isNew(cap.name))
				.map((cap) => new PetkitSwitchEntity(device, cap, this.feedAmount));
		}
	}
}
