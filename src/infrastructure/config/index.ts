export { loadSettings, envSchema } from './settings.js';
export type { Settings, TransportSettings } from './settings.js';
