/**
 * FIFO async mutex guarding a piece of state.
 *
 * Every runExclusive()/update() call is queued behind the ones issued
 * before it, so tasks observe each other's effects in arrival order.
 * A rejected task does not block the tasks queued after it.
 */
export class Mutex<T> {
	private data: T;
	private tail: Promise<void> = Promise.resolve();
	private pending = 0;

	constructor(initialData: T) {
		this.data = initialData;
	}

	/**
	 * Run fn with exclusive access to the guarded data.
	 */
	runExclusive<R>(fn: (data: T) => R | Promise<R>): Promise<R> {
		this.pending++;
		const run = this.tail.then(() => fn(this.data));
		this.tail = run.then(
			() => {
				this.pending--;
			},
			() => {
				this.pending--;
			},
		);
		return run;
	}

	/**
	 * Replace the guarded data with the value returned by fn.
	 */
	update(fn: (data: T) => T | Promise<T>): Promise<T> {
		return this.runExclusive(async data => {
			this.data = await fn(data);
			return this.data;
		});
	}

	/**
	 * Current data without waiting for queued tasks.
	 */
	getSnapshot(): Readonly<T> {
		return this.data;
	}

	/**
	 * Resolves once every task queued so far, and any queued while
	 * waiting, has settled.
	 */
	async waitForIdle(): Promise<void> {
		while (this.pending > 0) {
			await this.tail;
		}
	}
}
