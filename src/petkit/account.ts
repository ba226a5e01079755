// src/petkit/account.ts
import { ApiClient, createConsoleLogger, type PetkitLogger } from './api-client.js';
import type { PetkitAccountConfig } from './config.js';
import { PollingCoordinator } from './coordinator.js';
import { DeviceRegistry } from './device-registry.js';
import { EntityBinder, type RegisterEntities } from './entity-binder.js';
import { SessionManager } from './session-manager.js';
import type { SessionStore } from './session-store.js';

/**
 * Everything one configured account needs, created together at launch and
 * torn down together at shutdown.
 */
export class PetkitAccount {
	public readonly client: ApiClient;
	public readonly session: SessionManager;
	public readonly registry: DeviceRegistry;
	public readonly binder: EntityBinder;
	public readonly coordinator: PollingCoordinator;
	private readonly log: PetkitLogger;

	public constructor(
		public readonly config: PetkitAccountConfig,
		store: SessionStore,
		register: RegisterEntities,
		logger?: PetkitLogger,
	) {
		this.log = logger ?? createConsoleLogger('petkit-account');
		this.client = new ApiClient(config.apiBase, this.log);
		this.session = new SessionManager(config, this.client, store, this.log);
		this.registry = new DeviceRegistry(this.client, this.log);
		this.binder = new EntityBinder(register, {
			feedAmount: config.feedAmount,
			logger: this.log,
		});
		this.coordinator = new PollingCoordinator(
			this.client,
			this.session,
			this.registry,
			this.binder,
			{
				intervalMs: config.pollingIntervalSec * 1000,
				logger: this.log,
			},
		);
	}

	/**
	 * Adopt or obtain a session, then run the first refresh and start
	 * polling. Returns false when no session could be established.
	 */
	public async setup(): Promise<boolean> {
		try {
			await this.session.loadOrLogin();
		} catch (err) {
			this.log.error(
				'Petkit: cannot set up account %s: %s',
				this.config.username,
				err instanceof Error ? err.message : String(err),
			);
			return false;
		}

		await this.coordinator.start();
		this.log.info(
			'Petkit: account %s ready with %d device(s); polling every %ds.',
			this.config.username,
			this.registry.size,
			this.config.pollingIntervalSec,
		);
		return true;
	}

	public shutdown(): void {
		this.coordinator.stop();
	}
}
