import {describe, expect, it} from 'vitest';
import {homedir} from 'os';
import {join} from 'path';
import {resolveConfigDir} from './configDir.js';

describe('resolveConfigDir', () => {
	it('prefers an explicit config directory over dev mode', () => {
		expect(
			resolveConfigDir({
				DESKFLIP_CONFIG_DIR: '/tmp/deskflip-custom',
				DESKFLIP_DEV: '1',
			}),
		).toEqual({dir: '/tmp/deskflip-custom', custom: true, devMode: false});
	});

	it('uses a local directory in dev mode', () => {
		expect(resolveConfigDir({DESKFLIP_DEV: '1'})).toEqual({
			dir: join(process.cwd(), '.deskflip-dev'),
			custom: true,
			devMode: true,
		});
	});

	it('ignores an empty config directory variable', () => {
		expect(resolveConfigDir({DESKFLIP_CONFIG_DIR: ''}).custom).toBe(false);
	});

	it.skipIf(process.platform === 'win32')(
		'falls back to ~/.config/deskflip',
		() => {
			expect(resolveConfigDir({})).toEqual({
				dir: join(homedir(), '.config', 'deskflip'),
				custom: false,
				devMode: false,
			});
		},
	);

	it('reads process.env by default', () => {
		// The test setup points DESKFLIP_CONFIG_DIR at a temp directory
		expect(resolveConfigDir().dir).toBe(process.env['DESKFLIP_CONFIG_DIR']);
	});
});
