import {homedir} from 'os';
import {join} from 'path';
import {ENV_VARS, isDevMode} from '../constants/env.js';

export interface ConfigDirInfo {
	dir: string;
	custom: boolean; // Chosen by DESKFLIP_CONFIG_DIR or dev mode
	devMode: boolean;
}

const APP_DIR_NAME = 'deskflip';
const DEV_DIR_NAME = '.deskflip-dev';

function defaultConfigDir(env: NodeJS.ProcessEnv): string {
	if (process.platform === 'win32') {
		const appData = env['APPDATA'] || join(homedir(), 'AppData', 'Roaming');
		return join(appData, APP_DIR_NAME);
	}
	return join(homedir(), '.config', APP_DIR_NAME);
}

/**
 * Where deskflip keeps config.json and its log file.
 *
 * An explicit DESKFLIP_CONFIG_DIR wins, then DESKFLIP_DEV=1 selects
 * .deskflip-dev/ under the working directory, then the per-user default.
 */
export function resolveConfigDir(
	env: NodeJS.ProcessEnv = process.env,
): ConfigDirInfo {
	const explicit = env[ENV_VARS.CONFIG_DIR];
	if (explicit) {
		return {dir: explicit, custom: true, devMode: false};
	}

	if (isDevMode(env)) {
		return {
			dir: join(process.cwd(), DEV_DIR_NAME),
			custom: true,
			devMode: true,
		};
	}

	return {dir: defaultConfigDir(env), custom: false, devMode: false};
}
