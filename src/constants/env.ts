// Environment variable names
export const ENV_VARS = {
	CONFIG_DIR: 'DESKFLIP_CONFIG_DIR',
	IDASEN_CONFIG: 'DESKFLIP_IDASEN_CONFIG',
	LOG_LEVEL: 'DESKFLIP_LOG_LEVEL',
	DEV_MODE: 'DESKFLIP_DEV',
} as const;

/**
 * Check if running in dev mode.
 * Dev mode uses local .deskflip-dev/ config directory instead of global config.
 */
export function isDevMode(env: NodeJS.ProcessEnv = process.env): boolean {
	return env[ENV_VARS.DEV_MODE] === '1';
}
