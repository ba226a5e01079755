// src/settings.ts

/** Must match `pluginAlias` in config.schema.json. */
export const PLATFORM_NAME = 'PetkitFeeder';

/** Must match the package name. */
export const PLUGIN_NAME = 'homebridge-petkit-feeder';
