import {describe, expect, it} from 'vitest';
import os from 'os';
import path from 'path';
import {expandTilde} from './paths.js';

describe('expandTilde', () => {
	it('expands a bare ~', () => {
		expect(expandTilde('~')).toBe(os.homedir());
	});

	it('expands ~/ to a path under the home directory', () => {
		expect(expandTilde('~/.config/idasen/idasen.yaml')).toBe(
			path.join(os.homedir(), '.config/idasen/idasen.yaml'),
		);
	});

	it('leaves ~user paths alone', () => {
		expect(expandTilde('~desk/idasen.yaml')).toBe('~desk/idasen.yaml');
	});

	it('leaves absolute and relative paths alone', () => {
		expect(expandTilde('/etc/idasen.yaml')).toBe('/etc/idasen.yaml');
		expect(expandTilde('idasen~.yaml')).toBe('idasen~.yaml');
	});
});
