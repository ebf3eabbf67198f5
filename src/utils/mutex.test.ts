import {describe, expect, it} from 'vitest';
import {Mutex} from './mutex.js';

const delay = (ms: number) =>
	new Promise<void>(resolve => {
		setTimeout(resolve, ms);
	});

describe('Mutex', () => {
	it('runs tasks one at a time in arrival order', async () => {
		const mutex = new Mutex<string[]>([]);

		const first = mutex.runExclusive(async log => {
			log.push('first:start');
			await delay(20);
			log.push('first:end');
			return 1;
		});
		const second = mutex.runExclusive(log => {
			log.push('second');
			return 2;
		});

		expect(await Promise.all([first, second])).toEqual([1, 2]);
		expect(mutex.getSnapshot()).toEqual(['first:start', 'first:end', 'second']);
	});

	it('keeps processing after a task rejects', async () => {
		const mutex = new Mutex({count: 0});

		const failing = mutex.runExclusive(() => {
			throw new Error('boom');
		});
		const next = mutex.update(data => ({count: data.count + 1}));

		await expect(failing).rejects.toThrow('boom');
		expect(await next).toEqual({count: 1});
	});

	it('replaces the guarded data on update', async () => {
		const mutex = new Mutex({count: 1});

		await mutex.update(async data => ({count: data.count * 10}));

		expect(mutex.getSnapshot()).toEqual({count: 10});
	});

	it('waits for queued tasks to settle', async () => {
		const mutex = new Mutex<number[]>([]);

		void mutex.runExclusive(async values => {
			await delay(10);
			values.push(1);
		});
		void mutex.runExclusive(values => {
			values.push(2);
		});

		expect(mutex.getSnapshot()).toEqual([]);
		await mutex.waitForIdle();
		expect(mutex.getSnapshot()).toEqual([1, 2]);
	});

	it('waits for tasks queued while it was waiting', async () => {
		const mutex = new Mutex<number[]>([]);

		void mutex.runExclusive(values => {
			values.push(1);
			void mutex.runExclusive(inner => {
				inner.push(2);
			});
		});

		await mutex.waitForIdle();
		expect(mutex.getSnapshot()).toEqual([1, 2]);
	});
});
