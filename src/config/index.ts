/**
 * Config module - configuration resolution
 */

export type { CliFlags, FileConfig, ResolveConfigOptions } from './resolve-config';
export { PROJECT_CONFIG_FILE, resolveConfig, loadConfigFile, parseFov } from './resolve-config';

export { formatEffectiveConfigForDisplay } from './format-effective-config';
