// src/petkit/device-registry.ts
import type { ApiClient, PetkitLogger } from './api-client.js';
import { PetkitDevice, type PetkitDeviceData } from './device.js';

/**
 * Devices by vendor id. Entries are created once and updated in place, so
 * subscriptions taken on a device survive every later refresh.
 */
export class DeviceRegistry {
	private readonly devices = new Map<string, PetkitDevice>();

	public constructor(
		private readonly client: ApiClient,
		private readonly log?: PetkitLogger,
	) {}

	public upsert(id: string, data: PetkitDeviceData): PetkitDevice {
		const existing = this.devices.get(id);
		if (existing) {
			existing.updateData(data);
			return existing;
		}

		const device = new PetkitDevice(id, data, this.client, this.log);
		this.devices.set(id, device);
		this.log?.info('Petkit: new device %s (%s) "%s"', id, device.type || 'unknown', device.name);
		return device;
	}

	public get(id: string): PetkitDevice | undefined {
		return this.devices.get(id);
	}

	public has(id: string): boolean {
		return this.devices.has(id);
	}

	public get size(): number {
		return this.devices.size;
	}

	public all(): PetkitDevice[] {
		return [...this.devices.values()];
	}
}
