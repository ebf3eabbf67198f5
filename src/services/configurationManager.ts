import {join} from 'path';
import {existsSync, mkdirSync, readFileSync, writeFileSync} from 'fs';
import {Effect, Either} from 'effect';
import {
	ConfigurationData,
	DeskConfig,
	DwellPolicy,
	NaggingConfig,
	ResolvedConfiguration,
} from '../types/index.js';
import {
	ConfigError,
	FileSystemError,
	ValidationError,
	formatAppError,
} from '../types/errors.js';
import {LOG_LEVELS, isLogLevel, logger} from '../utils/logger.js';
import {ENV_VARS} from '../constants/env.js';
import {
	DEFAULT_DESK_COMMAND,
	DEFAULT_DWELL_MINUTES,
	DEFAULT_IDASEN_CONFIG_PATH,
	DEFAULT_TOGGLE_POSITIONS,
	MINUTE_MS,
} from '../constants/desk.js';

export const DEFAULT_CONFIGURATION: ResolvedConfiguration = {
	nagging: {
		enabled: true,
		dwellMinutes: {...DEFAULT_DWELL_MINUTES},
		togglePositions: [...DEFAULT_TOGGLE_POSITIONS],
	},
	desk: {
		command: DEFAULT_DESK_COMMAND,
		configPath: DEFAULT_IDASEN_CONFIG_PATH,
	},
	logLevel: 'info',
};

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(
	field: string,
	constraint: string,
	receivedValue: unknown,
): Either.Either<never, ValidationError> {
	return Either.left(new ValidationError({field, constraint, receivedValue}));
}

function validateNagging(
	value: unknown,
): Either.Either<Partial<NaggingConfig> | undefined, ValidationError> {
	if (value === undefined) {
		return Either.right(undefined);
	}
	if (!isRecord(value)) {
		return invalid('nagging', 'must be an object', value);
	}

	const nagging: Partial<NaggingConfig> = {};

	const enabled = value['enabled'];
	if (enabled !== undefined) {
		if (typeof enabled !== 'boolean') {
			return invalid('nagging.enabled', 'must be a boolean', enabled);
		}
		nagging.enabled = enabled;
	}

	const dwellMinutes = value['dwellMinutes'];
	if (dwellMinutes !== undefined) {
		if (!isRecord(dwellMinutes)) {
			return invalid(
				'nagging.dwellMinutes',
				'must map position names to minutes',
				dwellMinutes,
			);
		}
		const minutes: Record<string, number> = {};
		for (const [position, duration] of Object.entries(dwellMinutes)) {
			if (typeof duration !== 'number' || !Number.isFinite(duration)) {
				return invalid(
					`nagging.dwellMinutes.${position}`,
					'must be a number of minutes',
					duration,
				);
			}
			minutes[position] = duration;
		}
		nagging.dwellMinutes = minutes;
	}

	const togglePositions = value['togglePositions'];
	if (togglePositions !== undefined) {
		if (
			!Array.isArray(togglePositions) ||
			togglePositions.length !== 2 ||
			typeof togglePositions[0] !== 'string' ||
			typeof togglePositions[1] !== 'string' ||
			togglePositions[0] === togglePositions[1]
		) {
			return invalid(
				'nagging.togglePositions',
				'must list exactly two different position names',
				togglePositions,
			);
		}
		nagging.togglePositions = [togglePositions[0], togglePositions[1]];
	}

	return Either.right(nagging);
}

function validateDesk(
	value: unknown,
): Either.Either<Partial<DeskConfig> | undefined, ValidationError> {
	if (value === undefined) {
		return Either.right(undefined);
	}
	if (!isRecord(value)) {
		return invalid('desk', 'must be an object', value);
	}

	const desk: Partial<DeskConfig> = {};
	for (const field of ['command', 'configPath'] as const) {
		const fieldValue = value[field];
		if (fieldValue === undefined) {
			continue;
		}
		if (typeof fieldValue !== 'string' || fieldValue.trim() === '') {
			return invalid(`desk.${field}`, 'must be a non-empty string', fieldValue);
		}
		desk[field] = fieldValue;
	}
	return Either.right(desk);
}

/**
 * ConfigurationManager - deskflip settings stored as config.json in the
 * config directory. Missing fields fall back to DEFAULT_CONFIGURATION.
 */
export class ConfigurationManager {
	private configPath: string;
	private configDir: string;
	private config: ConfigurationData = {};

	constructor(configDir: string) {
		this.configDir = configDir;

		// Ensure config directory exists
		if (!existsSync(this.configDir)) {
			mkdirSync(this.configDir, {recursive: true});
		}

		this.configPath = join(this.configDir, 'config.json');
		this.loadConfig();
	}

	private loadConfig(): void {
		const result = Effect.runSync(Effect.either(this.loadConfigEffect()));
		if (Either.isLeft(result)) {
			logger.error(
				`Failed to load configuration, using defaults: ${formatAppError(result.left)}`,
			);
			this.config = {};
			return;
		}
		this.config = result.right;
	}

	getConfigPath(): string {
		return this.configPath;
	}

	hasConfigFile(): boolean {
		return existsSync(this.configPath);
	}

	/**
	 * Load configuration from file with Effect-based error handling
	 *
	 * A missing file is not an error and yields an empty configuration.
	 */
	loadConfigEffect(): Effect.Effect<
		ConfigurationData,
		FileSystemError | ConfigError,
		never
	> {
		return Effect.try({
			try: () => {
				if (!existsSync(this.configPath)) {
					return {};
				}

				const configData = readFileSync(this.configPath, 'utf-8');
				const validated = this.validateConfig(JSON.parse(configData));
				if (Either.isLeft(validated)) {
					throw new ConfigError({
						configPath: this.configPath,
						reason: 'validation',
						details: formatAppError(validated.left),
					});
				}
				return validated.right;
			},
			catch: (error: unknown) => {
				if (error instanceof ConfigError) {
					return error;
				}
				if (error instanceof SyntaxError) {
					return new ConfigError({
						configPath: this.configPath,
						reason: 'parse',
						details: String(error),
					});
				}
				return new FileSystemError({
					operation: 'read',
					path: this.configPath,
					cause: String(error),
				});
			},
		});
	}

	/**
	 * Save configuration to file with Effect-based error handling
	 */
	saveConfigEffect(
		config: ConfigurationData,
	): Effect.Effect<void, FileSystemError, never> {
		return Effect.try({
			try: () => {
				writeFileSync(this.configPath, `${JSON.stringify(config, null, 2)}\n`);
				this.config = config;
			},
			catch: (error: unknown) => {
				return new FileSystemError({
					operation: 'write',
					path: this.configPath,
					cause: String(error),
				});
			},
		});
	}

	/**
	 * Validate configuration structure
	 * Synchronous validation using Either
	 */
	validateConfig(
		config: unknown,
	): Either.Either<ConfigurationData, ValidationError> {
		if (!isRecord(config)) {
			return invalid('config', 'must be a valid configuration object', config);
		}

		const nagging = validateNagging(config['nagging']);
		if (Either.isLeft(nagging)) {
			return Either.left(nagging.left);
		}

		const desk = validateDesk(config['desk']);
		if (Either.isLeft(desk)) {
			return Either.left(desk.left);
		}

		const logLevel = config['logLevel'];
		if (logLevel !== undefined && !isLogLevel(logLevel)) {
			return invalid(
				'logLevel',
				`must be one of ${LOG_LEVELS.join(', ')}`,
				logLevel,
			);
		}

		const result: ConfigurationData = {};
		if (nagging.right) result.nagging = nagging.right;
		if (desk.right) result.desk = desk.right;
		if (logLevel !== undefined) result.logLevel = logLevel;
		return Either.right(result);
	}

	/**
	 * Stored configuration merged over defaults, with environment overrides applied.
	 */
	getConfiguration(): ResolvedConfiguration {
		return this.resolve(true);
	}

	private resolve(applyEnv: boolean): ResolvedConfiguration {
		const nagging = this.config.nagging ?? {};
		const desk = this.config.desk ?? {};
		const envConfigPath = applyEnv
			? process.env[ENV_VARS.IDASEN_CONFIG]
			: undefined;
		const envLogLevel = applyEnv ? process.env[ENV_VARS.LOG_LEVEL] : undefined;

		return {
			nagging: {
				enabled: nagging.enabled ?? DEFAULT_CONFIGURATION.nagging.enabled,
				dwellMinutes: {
					...DEFAULT_CONFIGURATION.nagging.dwellMinutes,
					...nagging.dwellMinutes,
				},
				togglePositions:
					nagging.togglePositions ??
					DEFAULT_CONFIGURATION.nagging.togglePositions,
			},
			desk: {
				command: desk.command ?? DEFAULT_CONFIGURATION.desk.command,
				configPath:
					envConfigPath ||
					desk.configPath ||
					DEFAULT_CONFIGURATION.desk.configPath,
			},
			logLevel: isLogLevel(envLogLevel)
				? envLogLevel
				: (this.config.logLevel ?? DEFAULT_CONFIGURATION.logLevel),
		};
	}

	/**
	 * Dwell minutes converted to the millisecond policy the controller takes.
	 */
	getDwellPolicy(): DwellPolicy {
		const policy: Record<string, number> = {};
		for (const [position, minutes] of Object.entries(
			this.getConfiguration().nagging.dwellMinutes,
		)) {
			policy[position] = minutes * MINUTE_MS;
		}
		return policy;
	}

	isNaggingEnabled(): boolean {
		return this.getConfiguration().nagging.enabled;
	}

	/**
	 * Write the stored configuration merged over defaults to config.json so
	 * every setting is visible for editing. Environment overrides are not written.
	 */
	writeDefaultsEffect(): Effect.Effect<
		ResolvedConfiguration,
		FileSystemError,
		never
	> {
		const resolved = this.resolve(false);
		return Effect.map(this.saveConfigEffect(resolved), () => resolved);
	}
}
