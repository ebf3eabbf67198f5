import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';
import {DwellTimer} from './dwellTimer.js';
import {InvalidDwellDurationError} from '../types/errors.js';

vi.mock('../utils/logger.js', () => ({
	logger: {
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	},
}));

describe('DwellTimer', () => {
	beforeEach(() => {
		vi.useFakeTimers();
		vi.setSystemTime(new Date('2026-01-05T09:00:00.000Z'));
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it('fires the timeout handler once after the duration elapses', () => {
		const onTimeout = vi.fn();
		const timer = new DwellTimer(onTimeout).start(60_000);

		vi.advanceTimersByTime(59_999);
		expect(onTimeout).not.toHaveBeenCalled();
		expect(timer.getStatus()).toBe('running');

		vi.advanceTimersByTime(1);
		expect(onTimeout).toHaveBeenCalledTimes(1);
		expect(onTimeout).toHaveBeenCalledWith(timer);
		expect(timer.isFired()).toBe(true);

		vi.advanceTimersByTime(600_000);
		expect(onTimeout).toHaveBeenCalledTimes(1);
	});

	it('does not block the caller while counting down', () => {
		const onTimeout = vi.fn();
		const timer = new DwellTimer(onTimeout);

		expect(timer.start(1_000)).toBe(timer);
		expect(onTimeout).not.toHaveBeenCalled();
		expect(vi.getTimerCount()).toBe(1);
	});

	it('never fires once aborted', () => {
		const onTimeout = vi.fn();
		const timer = new DwellTimer(onTimeout).start(60_000);

		vi.advanceTimersByTime(30_000);
		timer.abort();
		vi.advanceTimersByTime(60_000);

		expect(onTimeout).not.toHaveBeenCalled();
		expect(timer.isAborted()).toBe(true);
		expect(vi.getTimerCount()).toBe(0);
	});

	it('treats repeated aborts as no-ops', () => {
		const timer = new DwellTimer(vi.fn()).start(1_000);

		timer.abort();
		timer.abort();

		expect(timer.getStatus()).toBe('aborted');
	});

	it('ignores abort after the timeout was delivered', () => {
		const onTimeout = vi.fn();
		const timer = new DwellTimer(onTimeout).start(1_000);
		vi.advanceTimersByTime(1_000);

		expect(() => timer.abort()).not.toThrow();
		expect(timer.getStatus()).toBe('fired');
		expect(timer.isAborted()).toBe(false);
		expect(onTimeout).toHaveBeenCalledTimes(1);
	});

	it('can be aborted before it was started', () => {
		const onTimeout = vi.fn();
		const timer = new DwellTimer(onTimeout);

		timer.abort();

		expect(timer.getStatus()).toBe('aborted');
		expect(() => timer.start(1_000)).toThrow('cannot be started again');
		expect(onTimeout).not.toHaveBeenCalled();
	});

	it.each([0, -5_000, Number.NaN, Number.POSITIVE_INFINITY])(
		'rejects a duration of %s',
		durationMs => {
			const timer = new DwellTimer(vi.fn());

			expect(() => timer.start(durationMs)).toThrow(InvalidDwellDurationError);
			expect(timer.getStatus()).toBe('idle');
			expect(vi.getTimerCount()).toBe(0);
		},
	);

	it('refuses to start twice', () => {
		const timer = new DwellTimer(vi.fn()).start(1_000);

		expect(() => timer.start(1_000)).toThrow(
			`Dwell timer ${timer.id} cannot be started again (status: running)`,
		);
	});

	it('reports start and end times', () => {
		const start = Date.now();
		const timer = new DwellTimer(vi.fn());

		expect(timer.getStartedAt()).toBeNull();
		expect(timer.getEndsAt()).toBeNull();

		timer.start(90_000);

		expect(timer.getStartedAt()).toBe(start);
		expect(timer.getEndsAt()).toBe(start + 90_000);
		expect(timer.getDurationMs()).toBe(90_000);
	});

	it('gives every instance its own id', () => {
		const first = new DwellTimer(vi.fn());
		const second = new DwellTimer(vi.fn());

		expect(second.id).not.toBe(first.id);
	});
});
