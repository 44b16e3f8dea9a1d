export { SettingsManager } from './SettingsManager';
export { DEFAULT_SETTINGS } from './types';
export type { ReviewSettings } from './types';
