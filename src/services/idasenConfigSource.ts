import {existsSync, readFileSync} from 'fs';
import {parse} from 'yaml';
import {Effect, Either} from 'effect';
import {ConfigSource, PositionMap} from '../types/index.js';
import {ConfigError, FileSystemError} from '../types/errors.js';
import {expandTilde} from '../utils/paths.js';

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extract the `positions:` mapping from a parsed idasen configuration document.
 *
 * Heights must be finite numbers (metres). Keys other than `positions`
 * belong to the idasen tool and are ignored.
 */
export function parsePositionsDocument(
	document: unknown,
	configPath: string,
): Either.Either<PositionMap, ConfigError> {
	if (!isRecord(document)) {
		return Either.left(
			new ConfigError({
				configPath,
				reason: 'validation',
				details: 'configuration must be a YAML mapping',
			}),
		);
	}

	const positions = document['positions'];
	if (!isRecord(positions)) {
		return Either.left(
			new ConfigError({
				configPath,
				reason: 'validation',
				details: '`positions` must be a mapping of name to height',
			}),
		);
	}

	const result: Record<string, number> = {};
	for (const [name, height] of Object.entries(positions)) {
		if (typeof height !== 'number' || !Number.isFinite(height)) {
			return Either.left(
				new ConfigError({
					configPath,
					reason: 'validation',
					details: `height of position "${name}" must be a number, got ${JSON.stringify(height)}`,
				}),
			);
		}
		result[name] = height;
	}

	return Either.right(result);
}

/**
 * Reads positions from the idasen CLI configuration file
 * (~/.config/idasen/idasen.yaml by default).
 *
 * Nothing is cached: each call reads the file again.
 */
export class IdasenConfigSource implements ConfigSource {
	readonly configPath: string;

	constructor(configPath: string) {
		this.configPath = expandTilde(configPath);
	}

	positions(): Effect.Effect<PositionMap, ConfigError | FileSystemError> {
		return Effect.try({
			try: () => {
				if (!existsSync(this.configPath)) {
					throw new ConfigError({
						configPath: this.configPath,
						reason: 'missing',
						details: 'file does not exist',
					});
				}

				const raw = readFileSync(this.configPath, 'utf-8');
				let document: unknown;
				try {
					document = parse(raw);
				} catch (parseError) {
					throw new ConfigError({
						configPath: this.configPath,
						reason: 'parse',
						details: String(parseError),
					});
				}

				const result = parsePositionsDocument(document, this.configPath);
				if (Either.isLeft(result)) {
					throw result.left;
				}
				return result.right;
			},
			catch: error => {
				if (error instanceof ConfigError) {
					return error;
				}
				return new FileSystemError({
					operation: 'read',
					path: this.configPath,
					cause: String(error),
				});
			},
		});
	}
}
