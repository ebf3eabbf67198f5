import {spawn, type ChildProcess, type SpawnOptions} from 'child_process';
import {DeskMover, Position} from '../types/index.js';
import {DeskMoveError, formatAppError} from '../types/errors.js';
import {logger} from '../utils/logger.js';
import {DEFAULT_DESK_COMMAND} from '../constants/desk.js';

interface DeskMoverDependencies {
	spawnProcess: (
		command: string,
		args: string[],
		options: SpawnOptions,
	) => ChildProcess;
}

function createDeskMoverDependencies(
	overrides?: Partial<DeskMoverDependencies>,
): DeskMoverDependencies {
	return {
		spawnProcess: (command, args, options) => spawn(command, args, options),
		...overrides,
	};
}

/**
 * Moves the desk by running `<command> <position>` (the idasen CLI by default).
 *
 * The child is detached and never awaited. Spawn errors and non-zero exits
 * are logged here and go no further.
 */
export class IdasenDeskMover implements DeskMover {
	private readonly deps: DeskMoverDependencies;

	constructor(
		private readonly command: string = DEFAULT_DESK_COMMAND,
		dependencies?: Partial<DeskMoverDependencies>,
	) {
		this.deps = createDeskMoverDependencies(dependencies);
	}

	getCommand(): string {
		return this.command;
	}

	move(position: Position): void {
		logger.debug(`Running ${this.command} ${position}`);

		let child: ChildProcess;
		try {
			child = this.deps.spawnProcess(this.command, [position], {
				detached: true,
				stdio: 'ignore',
			});
		} catch (error) {
			this.report(position, String(error));
			return;
		}

		child.once('error', error => {
			this.report(position, error.message);
		});
		child.once('exit', (code, signal) => {
			if (code === 0) {
				logger.debug(`${this.command} ${position} finished`);
				return;
			}
			this.report(
				position,
				code !== null
					? `exited with code ${code}`
					: `terminated by signal ${signal ?? 'unknown'}`,
			);
		});
		child.unref();
	}

	private report(position: Position, cause: string): void {
		const error = new DeskMoveError({position, command: this.command, cause});
		logger.error(formatAppError(error));
	}
}
