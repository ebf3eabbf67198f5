import os from 'os';
import path from 'path';

/**
 * Expand a leading `~` or `~/` to the home directory. `~user` paths are
 * returned unchanged.
 */
export function expandTilde(filePath: string): string {
	if (filePath === '~') {
		return os.homedir();
	}
	if (filePath.startsWith('~/')) {
		return path.join(os.homedir(), filePath.slice(2));
	}
	return filePath;
}
