// src/platform.ts
import type {
	API,
	DynamicPlatformPlugin,
	Logger,
	PlatformAccessory,
	PlatformConfig,
} from 'homebridge';

import { PLATFORM_NAME, PLUGIN_NAME } from './settings.js';
import { PetkitAccount } from './petkit/account.js';
import { AccessoryRenderer } from './petkit/accessory-renderer.js';
import type { PetkitLogger } from './petkit/api-client.js';
import { parsePlatformConfig } from './petkit/config.js';
import { FileSessionStore } from './petkit/session-store.js';

const toPetkitLogger = (log: Logger): PetkitLogger => ({
	debug: log.debug.bind(log),
	info: log.info.bind(log),
	warn: log.warn.bind(log),
	error: log.error.bind(log),
});

export class PetkitPlatform implements DynamicPlatformPlugin {
	private readonly log: PetkitLogger;
	private readonly renderer: AccessoryRenderer;
	private readonly accounts: PetkitAccount[] = [];

	constructor(logger: Logger, config: PlatformConfig, api: API) {
		this.log = toPetkitLogger(logger);
		this.renderer = new AccessoryRenderer(api, this.log, PLUGIN_NAME, PLATFORM_NAME);

		const store = new FileSessionStore(api.user.storagePath());
		for (const account of parsePlatformConfig(config, this.log)) {
			this.accounts.push(
				new PetkitAccount(
					account,
					store,
					(domain, entities) => this.renderer.render(domain, entities),
					this.log,
				),
			);
		}

		if (this.accounts.length === 0) {
			this.log.warn('Petkit: no usable account in config.json; nothing to poll.');
		}

		this.log.info('%s initialized with %d account(s)', config.name ?? PLATFORM_NAME, this.accounts.length);

		api.on('didFinishLaunching', () => {
			void this.setupAccounts();
		});
		api.on('shutdown', () => {
			for (const account of this.accounts) {
				account.shutdown();
			}
		});
	}

	public configureAccessory(accessory: PlatformAccessory): void {
		this.log.info('Restoring cached accessory %s', accessory.displayName);
		this.renderer.restore(accessory);
	}

	private async setupAccounts(): Promise<void> {
		for (const account of this.accounts) {
			const ok = await account.setup();
			if (!ok) {
				this.log.warn('Petkit: account %s skipped.', account.config.username);
			}
		}
	}
}
