import {runConfigCommand} from './config.js';
import {runMoveCommand} from './move.js';
import {runPositionsCommand} from './positions.js';
import type {CliCommandContext, CliCommandHandler} from '../types.js';

const registry = new Map<string, CliCommandHandler>([
	['positions', runPositionsCommand],
	['move', runMoveCommand],
	['config', runConfigCommand],
	['init', runConfigCommand],
]);

export function getRegisteredCommands(): string[] {
	return [...registry.keys()];
}

export async function runRegisteredCommand(
	context: CliCommandContext,
): Promise<number | undefined> {
	const handler = registry.get(context.subcommand);
	if (!handler) {
		return undefined;
	}

	return handler(context);
}
