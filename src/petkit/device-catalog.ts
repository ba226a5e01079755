// src/petkit/device-catalog.ts

export interface PetkitDeviceModel {
	/** Roster `type`, lower-cased */
	type: string;

	/** Model name as shown in the Petkit app (what HomeKit shows) */
	modelName: string;

	/** Free-form notes for debugging */
	notes?: string;
}

/**
 * Device catalog keyed by roster type.
 * Extend this as more types show up.
 */
export const DEVICE_CATALOG: Record<string, PetkitDeviceModel> = {
	feeder: {
		type: 'feeder',
		modelName: 'Fresh Element Smart Feeder',
	},
	feedermini: {
		type: 'feedermini',
		modelName: 'Fresh Element Mini',
		notes: 'Uses its own save_dailyfeed path.',
	},
	d3: {
		type: 'd3',
		modelName: 'Fresh Element Infinity',
		notes: 'saveDailyFeed (camelCase) endpoint.',
	},
	d4: {
		type: 'd4',
		modelName: 'Fresh Element Solo',
		notes: 'saveDailyFeed (camelCase) endpoint.',
	},
};

export function lookupDeviceModel(type: string): PetkitDeviceModel | undefined {
	return DEVICE_CATALOG[type.toLowerCase()];
}

export function modelNameForType(type: string): string {
	return lookupDeviceModel(type)?.modelName ?? (type ? `Petkit ${type}` : 'Petkit Device');
}
