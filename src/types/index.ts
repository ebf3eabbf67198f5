import type {Effect} from 'effect';
import type {DwellTimer} from '../services/dwellTimer.js';
import type {ConfigError, FileSystemError} from './errors.js';
import type {LogLevel} from '../utils/logger.js';

/** Name of a physical desk height ("sit", "stand", …) */
export type Position = string;

/** Position name to desk height in metres, as defined by the desk configuration */
export type PositionMap = Readonly<Record<Position, number>>;

/**
 * Position name to dwell duration in milliseconds.
 * A missing, zero or negative entry disables nagging for that position.
 */
export type DwellPolicy = Readonly<Record<Position, number>>;

/** The two positions the controller alternates between on dwell timeout */
export type TogglePair = readonly [Position, Position];

/**
 * Source of valid positions. Queried on every position change since the
 * underlying file may be edited while deskflip runs.
 */
export interface ConfigSource {
	readonly configPath: string;
	positions(): Effect.Effect<PositionMap, ConfigError | FileSystemError>;
}

/**
 * Physically moves the desk. Fire-and-forget: nothing is returned and
 * failures stay on the mover's side of the boundary.
 */
export interface DeskMover {
	move(position: Position): void;
}

/**
 * Mutable controller state. Only ever touched through the controller's
 * state mutex.
 */
export interface ControllerState {
	currentPosition: Position | null;
	activeTimer: DwellTimer | null;
}

export interface DwellSnapshot {
	timerId: number;
	position: Position;
	durationMs: number;
	startedAt: number;
	endsAt: number;
}

export interface ControllerSnapshot {
	currentPosition: Position | null;
	dwell: DwellSnapshot | null;
	naggingEnabled: boolean;
}

export type PositionChangeTrigger = 'request' | 'toggle';

export type ApplyOutcome =
	| {
			type: 'moved';
			position: Position;
			previousPosition: Position | null;
			dwellMs: number | null;
			trigger: PositionChangeTrigger;
	  }
	| {
			type: 'unchanged';
			position: Position;
	  }
	| {
			type: 'ignored';
			reason: 'stale_timer' | 'no_complement';
	  };

export type PositionChangeListener = (
	snapshot: ControllerSnapshot,
	outcome: ApplyOutcome,
) => void;

// ============================================================================
// deskflip settings (config.json in the config directory)
// ============================================================================

export interface NaggingConfig {
	enabled: boolean;
	dwellMinutes: Record<Position, number>; // Minutes a position may be held before toggling
	togglePositions: [Position, Position];
}

export interface DeskConfig {
	command: string; // Executable invoked as `<command> <position>`
	configPath: string; // YAML file with the `positions:` mapping, ~ is expanded
}

export interface ConfigurationData {
	nagging?: Partial<NaggingConfig>;
	desk?: Partial<DeskConfig>;
	logLevel?: LogLevel;
}

export interface ResolvedConfiguration {
	nagging: NaggingConfig;
	desk: DeskConfig;
	logLevel: LogLevel;
}
