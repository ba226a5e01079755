import { describe, expect, it, vi } from 'vitest';

import { ApiClient } from '../src/petkit/api-client.js';
import type { CapabilityDomain } from '../src/petkit/capabilities.js';
import { PetkitDevice, type PetkitDeviceData } from '../src/petkit/device.js';
import {
	PetkitBinarySensorEntity,
	PetkitSensorEntity,
	PetkitSwitchEntity,
	type AnyPetkitEntity,
} from '../src/petkit/entities.js';
import { bindingKey, EntityBinder } from '../src/petkit/entity-binder.js';
import { okResult, silentLogger } from './helpers.js';

function makeDevice(
	data: PetkitDeviceData = {},
	client = new ApiClient('http://petkit.test/6/', silentLogger()),
): PetkitDevice {
	return new PetkitDevice('1001', { type: 'feeder', name: 'Kitchen', ...data }, client, silentLogger());
}

function collect() {
	const batches: [CapabilityDomain, AnyPetkitEntity[]][] = [];
	const register = vi.fn((domain: CapabilityDomain, entities: AnyPetkitEntity[]) => {
		batches.push([domain, entities]);
	});
	return { register, batches };
}

describe('EntityBinder', () => {
	it('creates one entity per capability of the domain', () => {
		const { register, batches } = collect();
		const binder = new EntityBinder(register, { logger: silentLogger() });
		const device = makeDevice();

		const created = binder.bind('sensor', device);

		expect(created.map((e) => e.capability.name)).toEqual(['state', 'desiccant']);
		expect(created.every((e) => e instanceof PetkitSensorEntity)).toBe(true);
		expect(register).toHaveBeenCalledTimes(1);
		expect(batches[0][0]).toBe('sensor');
		expect(device.listenerCount).toBe(2);
	});

	it('binds the same triple only once', () => {
		const { register } = collect();
		const binder = new EntityBinder(register, { logger: silentLogger() });
		const device = makeDevice();

		binder.bind('binary_sensor', device);
		const again = binder.bind('binary_sensor', device);

		expect(again).toEqual([]);
		expect(register).toHaveBeenCalledTimes(1);
		expect(binder.size).toBe(1);
		expect(device.listenerCount).toBe(1);
	});

	it('binds every domain with bindAll', () => {
		const { register, batches } = collect();
		const binder = new EntityBinder(register, { logger: silentLogger() });

		const created = binder.bindAll(makeDevice());

		expect(created).toHaveLength(4);
		expect(batches.map(([domain]) => domain)).toEqual(['sensor', 'binary_sensor', 'switch']);
		expect(binder.get('switch', 'feeding', '1001')).toBeInstanceOf(PetkitSwitchEntity);
		expect(bindingKey('switch', 'feeding', '1001')).toBe('switch.feeding.1001');
	});

	it('gives a new entity its first reading right away', () => {
		const { register } = collect();
		const binder = new EntityBinder(register, { logger: silentLogger() });
		const device = makeDevice({ state: 1, status: { desiccantLeftDays: 9 } });

		binder.bind('sensor', device);

		const state = binder.get('sensor', 'state', '1001');
		const desiccant = binder.get('sensor', 'desiccant', '1001');
		expect(state instanceof PetkitSensorEntity && state.state).toBe('online');
		expect(desiccant instanceof PetkitSensorEntity && desiccant.state).toBe(9);
		expect(desiccant?.unit).toBe('days');
	});
});

describe('entities', () => {
	function foodEntity(device: PetkitDevice): PetkitBinarySensorEntity {
		const binder = new EntityBinder(vi.fn(), { logger: silentLogger() });
		const [entity] = binder.bind('binary_sensor', device);
		if (!(entity instanceof PetkitBinarySensorEntity)) {
			throw new Error('expected a binary sensor');
		}
		return entity;
	}

	it('reports food code 0 as normal and off', () => {
		const entity = foodEntity(makeDevice({ status: { food: 0 } }));

		expect(entity.isOn).toBe(false);
		expect(entity.state).toBe('off');
		expect(entity.attributes).toEqual({ state: 0, desc: 'normal' });
		expect(entity.deviceClass).toBe('problem');
		expect(entity.icon).toBe('mdi:food-drumstick-outline');
	});

	it('reports a nonzero food code as few and on', () => {
		const entity = foodEntity(makeDevice({ status: { food: 1 } }));

		expect(entity.isOn).toBe(true);
		expect(entity.attributes).toEqual({ state: 1, desc: 'few' });
	});

	it('follows device updates', () => {
		const device = makeDevice({ status: { food: 0 } });
		const entity = foodEntity(device);
		const changed = vi.fn();
		entity.onChange(changed);

		device.updateData({ type: 'feeder', name: 'Kitchen', status: { food: 2 } });

		expect(entity.isOn).toBe(true);
		expect(changed).toHaveBeenCalledWith(entity);
	});

	it('names entities after the device and capability', () => {
		const entity = foodEntity(makeDevice());

		expect(entity.name).toBe('Kitchen food_state');
		expect(entity.uniqueId).toBe('feeder_1001-food_state');
	});

	it('feeds the configured amount from the switch', async () => {
		const client = new ApiClient('http://petkit.test/6/', silentLogger());
		const call = vi.spyOn(client, 'call').mockResolvedValue(okResult({ result: 'success' }));
		const device = makeDevice({}, client);
		const binder = new EntityBinder(vi.fn(), { feedAmount: 2, logger: silentLogger() });
		const [entity] = binder.bind('switch', device);
		if (!(entity instanceof PetkitSwitchEntity)) {
			throw new Error('expected a switch');
		}

		const rsp = await entity.turnOn();

		expect(rsp.ok).toBe(true);
		expect(call).toHaveBeenCalledWith('feeder/save_dailyfeed', expect.objectContaining({ amount: 20, deviceId: '1001' }));
		expect(entity.attributes).toEqual({ desc: undefined, error: undefined });
	});

	it('shows the feeding switch on while the device is feeding', () => {
		const device = makeDevice({ state: 3 });
		const binder = new EntityBinder(vi.fn(), { logger: silentLogger() });
		const [entity] = binder.bind('switch', device);

		expect(entity instanceof PetkitSwitchEntity && entity.isOn).toBe(true);
	});
});
