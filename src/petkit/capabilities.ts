// src/petkit/capabilities.ts
// Declarative capability descriptors. A device lists what it can report or do
// per domain; the entity binder and the HomeKit renderer only read these.

import type { ApiResult } from './api-client.js';

export type CapabilityDomain = 'sensor' | 'binary_sensor' | 'switch';

export const CAPABILITY_DOMAINS: readonly CapabilityDomain[] = ['sensor', 'binary_sensor', 'switch'];

export type StateAttributes = Record<string, unknown>;

interface CapabilityBase {
	name: string;
	unit?: string;
	/** Material Design icon hint, e.g. `mdi:shaker`. */
	icon?: string;
	/** Severity/class hint, e.g. `problem`. */
	deviceClass?: string;
	attributes?: () => StateAttributes;
}

export interface SensorCapability extends CapabilityBase {
	domain: 'sensor';
	read: () => string | number;
}

export interface BinarySensorCapability extends CapabilityBase {
	domain: 'binary_sensor';
	read: () => boolean;
}

export interface SwitchCapability extends CapabilityBase {
	domain: 'switch';
	read: () => boolean;
	turnOn: (amount?: number) => Promise<ApiResult>;
}

export interface CapabilityByDomain {
	sensor: SensorCapability;
	binary_sensor: BinarySensorCapability;
	switch: SwitchCapability;
}

export type Capability = CapabilityByDomain[CapabilityDomain];

export type CapabilityMap = {
	readonly [D in CapabilityDomain]: readonly CapabilityByDomain[D][];
};
