import {InvalidDwellDurationError} from '../types/errors.js';
import {logger} from '../utils/logger.js';

export type DwellTimerStatus = 'idle' | 'running' | 'fired' | 'aborted';

export type DwellTimeoutHandler = (timer: DwellTimer) => void;

let nextTimerId = 1;

/**
 * One-shot countdown for a single dwell period.
 *
 * `fired` and `aborted` are terminal and mutually exclusive: whichever
 * happens first wins and the other becomes a no-op. A new dwell period
 * always gets a new instance.
 */
export class DwellTimer {
	readonly id = nextTimerId++;

	private status: DwellTimerStatus = 'idle';
	private handle: NodeJS.Timeout | undefined;
	private durationMs = 0;
	private startedAt: number | null = null;

	constructor(
		private readonly onTimeout: DwellTimeoutHandler,
		private readonly now: () => number = () => Date.now(),
	) {}

	/**
	 * Begin counting down. Returns immediately; the timeout handler runs
	 * once the duration elapses unless abort() is called first.
	 *
	 * @throws {InvalidDwellDurationError} when durationMs is not a positive finite number
	 * @throws {Error} when the timer was already started
	 */
	start(durationMs: number): this {
		if (!Number.isFinite(durationMs) || durationMs <= 0) {
			throw new InvalidDwellDurationError({durationMs});
		}
		if (this.status !== 'idle') {
			throw new Error(
				`Dwell timer ${this.id} cannot be started again (status: ${this.status})`,
			);
		}

		this.durationMs = durationMs;
		this.startedAt = this.now();
		this.status = 'running';
		this.handle = setTimeout(() => this.expire(), durationMs);
		logger.debug(`Dwell timer ${this.id} started for ${durationMs}ms`);
		return this;
	}

	/**
	 * Suppress the pending timeout. Safe to call any number of times,
	 * before start and after the timer fired.
	 */
	abort(): void {
		if (this.status === 'fired' || this.status === 'aborted') {
			return;
		}

		this.status = 'aborted';
		if (this.handle !== undefined) {
			clearTimeout(this.handle);
			this.handle = undefined;
		}
		logger.debug(`Dwell timer ${this.id} aborted`);
	}

	getStatus(): DwellTimerStatus {
		return this.status;
	}

	isRunning(): boolean {
		return this.status === 'running';
	}

	isFired(): boolean {
		return this.status === 'fired';
	}

	isAborted(): boolean {
		return this.status === 'aborted';
	}

	getDurationMs(): number {
		return this.durationMs;
	}

	getStartedAt(): number | null {
		return this.startedAt;
	}

	getEndsAt(): number | null {
		return this.startedAt === null ? null : this.startedAt + this.durationMs;
	}

	private expire(): void {
		this.handle = undefined;
		if (this.status !== 'running') {
			return;
		}

		this.status = 'fired';
		logger.debug(`Dwell timer ${this.id} fired`);
		this.onTimeout(this);
	}
}
