export const MINUTE_MS = 60_000;

// Dwell minutes per position used until config.json says otherwise
export const DEFAULT_DWELL_MINUTES: Readonly<Record<string, number>> = {
	stand: 1,
	sit: 1,
};

export const DEFAULT_TOGGLE_POSITIONS: readonly [string, string] = [
	'sit',
	'stand',
];

export const DEFAULT_DESK_COMMAND = 'idasen';

export const DEFAULT_IDASEN_CONFIG_PATH = '~/.config/idasen/idasen.yaml';

export const LOG_FILENAME = 'deskflip.log';
