// src/petkit/accessory-renderer.ts
// Shows bound entities as HomeKit services: one accessory per device, one
// service per entity (subtype = capability name).
import type { API, PlatformAccessory, Service } from 'homebridge';

import { errorCodeOf, type PetkitLogger } from './api-client.js';
import type { CapabilityDomain } from './capabilities.js';
import type { PetkitDevice } from './device.js';
import { modelNameForType } from './device-catalog.js';
import type {
	AnyPetkitEntity,
	PetkitBinarySensorEntity,
	PetkitSensorEntity,
	PetkitSwitchEntity,
} from './entities.js';

/** Desiccant cartridges are rated for about a month. */
const DESICCANT_FULL_DAYS = 30;

/** How long a feeding switch stays on in HomeKit after a tap. */
const SWITCH_RESET_MS = 1000;

export function accessorySeed(device: PetkitDevice): string {
	return `petkit-${device.type}_${device.id}`;
}

export function desiccantLifeLevel(days: number): number {
	return Math.max(0, Math.min(100, Math.round((days / DESICCANT_FULL_DAYS) * 100)));
}

export class AccessoryRenderer {
	/** Accessories by UUID, restored ones included. */
	private readonly accessories = new Map<string, PlatformAccessory>();
	private readonly registered = new Set<string>();
	/** Contact sensors whose StatusActive/StatusFault follow the device state label. */
	private readonly statusServices = new Map<string, Service[]>();
	private readonly statusLabels = new Map<string, string | number>();

	public constructor(
		private readonly api: API,
		private readonly log: PetkitLogger,
		private readonly pluginName: string,
		private readonly platformName: string,
	) {}

	public restore(accessory: PlatformAccessory): void {
		this.accessories.set(accessory.UUID, accessory);
		this.registered.add(accessory.UUID);
	}

	/** Registration callback handed to every account's EntityBinder. */
	public render(domain: CapabilityDomain, entities: AnyPetkitEntity[]): void {
		const fresh: PlatformAccessory[] = [];
		const changed: PlatformAccessory[] = [];

		for (const entity of entities) {
			const accessory = this.accessoryFor(entity.device);

			switch (entity.domain) {
			case 'sensor':
				this.renderSensor(accessory, entity);
				break;
			case 'binary_sensor':
				this.renderBinarySensor(accessory, entity);
				break;
			case 'switch':
				this.renderSwitch(accessory, entity);
				break;
			}

			const target = this.registered.has(accessory.UUID) ? changed : fresh;
			if (!target.includes(accessory)) {
				target.push(accessory);
			}
		}

		if (fresh.length > 0) {
			this.api.registerPlatformAccessories(this.pluginName, this.platformName, fresh);
			for (const accessory of fresh) {
				this.registered.add(accessory.UUID);
			}
		}
		if (changed.length > 0) {
			this.api.updatePlatformAccessories(changed);
		}

		this.log.debug('Petkit: rendered %d %s entit%s', entities.length, domain, entities.length === 1 ? 'y' : 'ies');
	}

	private accessoryFor(device: PetkitDevice): PlatformAccessory {
		const uuid = this.api.hap.uuid.generate(accessorySeed(device));
		const displayName = device.name || `Petkit ${device.id}`;

		let accessory = this.accessories.get(uuid);
		if (!accessory) {
			this.log.info('Petkit: adding accessory %s (%s)', displayName, device.id);
			accessory = new this.api.platformAccessory(displayName, uuid);
			this.accessories.set(uuid, accessory);
		}

		accessory.context.petkit = { deviceId: device.id, type: device.type };

		const Characteristic = this.api.hap.Characteristic;
		const info = accessory.getService(this.api.hap.Service.AccessoryInformation)
			?? accessory.addService(this.api.hap.Service.AccessoryInformation);
		info
			.setCharacteristic(Characteristic.Manufacturer, 'Petkit')
			.setCharacteristic(Characteristic.Model, modelNameForType(device.type))
			.setCharacteristic(Characteristic.SerialNumber, device.id);

		return accessory;
	}

	private renderSensor(accessory: PlatformAccessory, entity: PetkitSensorEntity): void {
		const { Service, Characteristic } = this.api.hap;

		if (entity.unit !== 'days') {
			// Unitless sensors (the activity label) decorate the contact sensors.
			this.statusLabels.set(accessory.UUID, entity.state);
			entity.onChange((e) => {
				this.statusLabels.set(accessory.UUID, e.state);
				this.applyStatus(accessory.UUID);
			});
			this.applyStatus(accessory.UUID);
			return;
		}

		const subtype = entity.capability.name;
		const service = accessory.getServiceById(Service.FilterMaintenance, subtype)
			?? accessory.addService(Service.FilterMaintenance, entity.name, subtype);
		service.setCharacteristic(Characteristic.Name, entity.name);

		const push = (e: PetkitSensorEntity): void => {
			const days = typeof e.state === 'number' ? e.state : 0;
			service.updateCharacteristic(Characteristic.FilterLifeLevel, desiccantLifeLevel(days));
			service.updateCharacteristic(
				Characteristic.FilterChangeIndication,
				days <= 0
					? Characteristic.FilterChangeIndication.CHANGE_FILTER
					: Characteristic.FilterChangeIndication.FILTER_OK,
			);
		};
		entity.onChange(push);
		push(entity);
	}

	private renderBinarySensor(accessory: PlatformAccessory, entity: PetkitBinarySensorEntity): void {
		const { Service, Characteristic } = this.api.hap;
		const subtype = entity.capability.name;
		const service = accessory.getServiceById(Service.ContactSensor, subtype)
			?? accessory.addService(Service.ContactSensor, entity.name, subtype);
		service.setCharacteristic(Characteristic.Name, entity.name);
		this.trackStatusService(accessory.UUID, service);

		const push = (e: PetkitBinarySensorEntity): void => {
			service.updateCharacteristic(
				Characteristic.ContactSensorState,
				e.isOn
					? Characteristic.ContactSensorState.CONTACT_NOT_DETECTED
					: Characteristic.ContactSensorState.CONTACT_DETECTED,
			);
		};
		entity.onChange(push);
		push(entity);
	}

	private renderSwitch(accessory: PlatformAccessory, entity: PetkitSwitchEntity): void {
		const { Service, Characteristic } = this.api.hap;
		const subtype = entity.capability.name;
		const service = accessory.getServiceById(Service.Switch, subtype)
			?? accessory.addService(Service.Switch, entity.name, subtype);
		service.setCharacteristic(Characteristic.Name, entity.name);

		service.getCharacteristic(Characteristic.On)
			.onGet(() => entity.isOn)
			.onSet(async (value) => {
				if (value !== true && value !== 1) {
					return;
				}

				this.log.info('Petkit: %s -> feed now', entity.name);
				const rsp = await entity.turnOn();
				setTimeout(() => service.updateCharacteristic(Characteristic.On, entity.isOn), SWITCH_RESET_MS);

				if (!rsp.ok || errorCodeOf(rsp) !== 0) {
					this.log.warn('Petkit: %s feed request was not accepted', entity.name);
					throw new this.api.hap.HapStatusError(
						this.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE,
					);
				}
			});

		entity.onChange((e) => service.updateCharacteristic(Characteristic.On, e.isOn));
	}

	private trackStatusService(uuid: string, service: Service): void {
		const list = this.statusServices.get(uuid) ?? [];
		if (!list.includes(service)) {
			list.push(service);
		}
		this.statusServices.set(uuid, list);
		this.applyStatus(uuid);
	}

	private applyStatus(uuid: string): void {
		const label = this.statusLabels.get(uuid);
		if (label === undefined) {
			return;
		}
		const Characteristic = this.api.hap.Characteristic;
		for (const service of this.statusServices.get(uuid) ?? []) {
			service.updateCharacteristic(Characteristic.StatusActive, label !== 'offline');
			service.updateCharacteristic(Characteristic.StatusFault, label === 'device_error' ? 1 : 0);
		}
	}
}
