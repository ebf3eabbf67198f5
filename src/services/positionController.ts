import {Effect, Either} from 'effect';
import {pipe} from 'effect/Function';
import {
	ApplyOutcome,
	ConfigSource,
	ControllerSnapshot,
	ControllerState,
	DeskMover,
	DwellPolicy,
	Position,
	PositionChangeListener,
	PositionChangeTrigger,
	PositionMap,
	TogglePair,
} from '../types/index.js';
import {
	ConfigUnavailableError,
	ControllerDisposedError,
	InvalidPositionError,
	PositionChangeError,
	ValidationError,
	formatAppError,
} from '../types/errors.js';
import {DwellTimer} from './dwellTimer.js';
import {Mutex} from '../utils/mutex.js';
import {logger} from '../utils/logger.js';
import {DEFAULT_TOGGLE_POSITIONS} from '../constants/desk.js';

export interface PositionControllerOptions {
	configSource: ConfigSource;
	deskMover: DeskMover;
	dwellPolicy?: DwellPolicy;
	naggingEnabled?: boolean;
	togglePositions?: TogglePair;
	now?: () => number;
}

export type PositionChangeResult = Either.Either<
	ApplyOutcome,
	PositionChangeError
>;

/**
 * PositionController - owns the desk's logical position.
 *
 * Every command, whether requested by the user or raised by an expiring
 * dwell timer, runs through a single FIFO mutex. A timeout is only acted
 * upon when it comes from the timer currently stored as active; anything
 * else is a stale signal from a superseded dwell period.
 */
export class PositionController {
	private readonly configSource: ConfigSource;
	private readonly deskMover: DeskMover;
	private readonly dwellPolicy: DwellPolicy;
	private readonly naggingEnabled: boolean;
	private readonly togglePositions: TogglePair;
	private readonly now: () => number;

	private readonly stateMutex = new Mutex<ControllerState>({
		currentPosition: null,
		activeTimer: null,
	});
	private readonly listeners = new Set<PositionChangeListener>();
	private disposed = false;

	constructor(options: PositionControllerOptions) {
		const togglePositions = options.togglePositions ?? DEFAULT_TOGGLE_POSITIONS;
		if (togglePositions[0] === togglePositions[1]) {
			throw new ValidationError({
				field: 'togglePositions',
				constraint: 'must name two different positions',
				receivedValue: togglePositions,
			});
		}

		this.configSource = options.configSource;
		this.deskMover = options.deskMover;
		this.dwellPolicy = options.dwellPolicy ?? {};
		this.naggingEnabled = options.naggingEnabled ?? true;
		this.togglePositions = togglePositions;
		this.now = options.now ?? (() => Date.now());
	}

	/**
	 * Queue a position change requested by the user.
	 *
	 * Resolves once the change has been applied (or rejected) in arrival
	 * order relative to every other command.
	 */
	requestPositionChange(position: Position): Promise<PositionChangeResult> {
		return this.stateMutex.runExclusive<PositionChangeResult>(state => {
			if (this.disposed) {
				return Either.left(new ControllerDisposedError({position}));
			}
			return this.runApply(state, position, 'request');
		});
	}

	/**
	 * Queue the timeout of a dwell timer. Signals from any timer other than
	 * the active one resolve to an `ignored` outcome without touching state.
	 */
	signalTimeout(timer: DwellTimer): Promise<PositionChangeResult> {
		return this.stateMutex.runExclusive<PositionChangeResult>(async state => {
			if (this.disposed || state.activeTimer !== timer) {
				logger.debug(`Ignoring stale timeout from dwell timer ${timer.id}`);
				return Either.right<ApplyOutcome>({
					type: 'ignored',
					reason: 'stale_timer',
				});
			}

			state.activeTimer = null;
			const next = this.complementOf(state.currentPosition);
			if (next === null) {
				logger.warn(
					`Position timeout at "${state.currentPosition}", which is not one of the toggle positions (${this.togglePositions.join(', ')}); staying put`,
				);
				return Either.right<ApplyOutcome>({
					type: 'ignored',
					reason: 'no_complement',
				});
			}

			logger.debug(`Position timeout, toggling position to ${next}...`);
			const result = await this.runApply(state, next, 'toggle');
			if (Either.isLeft(result)) {
				logger.error(
					`Failed to toggle position to "${next}": ${formatAppError(result.left)}`,
				);
			}
			return result;
		});
	}

	getCurrentPosition(): Position | null {
		return this.stateMutex.getSnapshot().currentPosition;
	}

	getSnapshot(): ControllerSnapshot {
		const {currentPosition, activeTimer} = this.stateMutex.getSnapshot();
		const startedAt = activeTimer?.getStartedAt() ?? null;
		const endsAt = activeTimer?.getEndsAt() ?? null;

		return {
			currentPosition,
			dwell:
				activeTimer &&
				activeTimer.isRunning() &&
				currentPosition !== null &&
				startedAt !== null &&
				endsAt !== null
					? {
							timerId: activeTimer.id,
							position: currentPosition,
							durationMs: activeTimer.getDurationMs(),
							startedAt,
							endsAt,
						}
					: null,
			naggingEnabled: this.naggingEnabled,
		};
	}

	isNaggingEnabled(): boolean {
		return this.naggingEnabled;
	}

	getTogglePositions(): TogglePair {
		return this.togglePositions;
	}

	/**
	 * The position a dwell timeout at `position` toggles to, or null when
	 * `position` is not part of the toggle pair.
	 */
	complementOf(position: Position | null): Position | null {
		const [first, second] = this.togglePositions;
		if (position === first) return second;
		if (position === second) return first;
		return null;
	}

	onChange(listener: PositionChangeListener): void {
		this.listeners.add(listener);
	}

	offChange(listener: PositionChangeListener): void {
		this.listeners.delete(listener);
	}

	/**
	 * Resolves once every command queued so far has been processed.
	 */
	whenIdle(): Promise<void> {
		return this.stateMutex.waitForIdle();
	}

	/**
	 * Abort the running dwell timer and refuse any command queued after this call.
	 */
	dispose(): Promise<void> {
		return this.stateMutex.runExclusive(state => {
			this.disposed = true;
			state.activeTimer?.abort();
			state.activeTimer = null;
			this.listeners.clear();
		});
	}

	private async runApply(
		state: ControllerState,
		position: Position,
		trigger: PositionChangeTrigger,
	): Promise<PositionChangeResult> {
		const result = await Effect.runPromise(
			Effect.either(this.applyPositionEffect(state, position, trigger)),
		);
		if (Either.isRight(result) && result.right.type === 'moved') {
			this.notify(result.right);
		}
		return result;
	}

	private applyPositionEffect(
		state: ControllerState,
		position: Position,
		trigger: PositionChangeTrigger,
	): Effect.Effect<ApplyOutcome, InvalidPositionError | ConfigUnavailableError> {
		return pipe(
			this.loadPositions(),
			Effect.flatMap(
				(positions): Effect.Effect<ApplyOutcome, InvalidPositionError> =>
					Object.hasOwn(positions, position)
						? Effect.sync(() => this.commitPosition(state, position, trigger))
						: Effect.fail(
								new InvalidPositionError({
									position,
									available: Object.keys(positions),
								}),
							),
			),
		);
	}

	private loadPositions(): Effect.Effect<PositionMap, ConfigUnavailableError> {
		return pipe(
			this.configSource.positions(),
			Effect.mapError(error =>
				error._tag === 'ConfigError'
					? new ConfigUnavailableError({
							configPath: error.configPath,
							reason: error.reason,
							details: error.details,
						})
					: new ConfigUnavailableError({
							configPath: error.path,
							reason: error.operation,
							details: error.cause,
						}),
			),
		);
	}

	private commitPosition(
		state: ControllerState,
		position: Position,
		trigger: PositionChangeTrigger,
	): ApplyOutcome {
		if (state.currentPosition === position) {
			logger.debug(`Already at position ${position}`);
			return {type: 'unchanged', position};
		}

		const previousPosition = state.currentPosition;
		logger.info(`Changing position to ${position}...`);
		state.currentPosition = position;

		try {
			this.deskMover.move(position);
		} catch (error) {
			logger.error(`Desk mover threw while moving to "${position}"`, error);
		}

		const dwellMs = this.restartDwellTimer(state, position);
		return {type: 'moved', position, previousPosition, dwellMs, trigger};
	}

	private restartDwellTimer(
		state: ControllerState,
		position: Position,
	): number | null {
		state.activeTimer?.abort();
		state.activeTimer = null;

		const dwellMs = this.resolveDwellMs(position);
		if (dwellMs === null) {
			return null;
		}

		logger.debug(`Setting dwell timer for ${position} to ${dwellMs}ms...`);
		const timer = new DwellTimer(fired => this.handleTimeout(fired), this.now);
		state.activeTimer = timer.start(dwellMs);
		return dwellMs;
	}

	private resolveDwellMs(position: Position): number | null {
		if (!this.naggingEnabled || !Object.hasOwn(this.dwellPolicy, position)) {
			return null;
		}

		const dwellMs = this.dwellPolicy[position];
		if (dwellMs === undefined || !Number.isFinite(dwellMs) || dwellMs <= 0) {
			return null;
		}
		return dwellMs;
	}

	private handleTimeout(timer: DwellTimer): void {
		this.signalTimeout(timer).catch((error: unknown) => {
			logger.error(`Dwell timer ${timer.id} timeout handling failed`, error);
		});
	}

	private notify(outcome: ApplyOutcome): void {
		const snapshot = this.getSnapshot();
		for (const listener of this.listeners) {
			try {
				listener(snapshot, outcome);
			} catch (error) {
				logger.error('Position change listener failed', error);
			}
		}
	}
}
