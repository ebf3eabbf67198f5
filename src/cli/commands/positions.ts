import {Effect, Either} from 'effect';
import {formatAppError} from '../../types/errors.js';
import {formatColumns} from '../formatter.js';
import type {CliCommandContext} from '../types.js';

interface PositionSummary {
	name: string;
	height: number;
	dwellMinutes: number | null;
	toggle: boolean;
}

export async function runPositionsCommand(
	context: CliCommandContext,
): Promise<number> {
	const {configuration, configSource} = context.createRuntime({
		naggingEnabled: false,
	});

	const result = await Effect.runPromise(
		Effect.either(configSource.positions()),
	);
	if (Either.isLeft(result)) {
		const message = formatAppError(result.left);
		context.formatter.writeError({
			text: [`Error: ${message}`],
			data: {error: result.left._tag, message},
		});
		return 1;
	}

	const {dwellMinutes, togglePositions} = configuration.nagging;
	const summaries: PositionSummary[] = Object.entries(result.right).map(
		([name, height]) => {
			const minutes = Object.hasOwn(dwellMinutes, name)
				? dwellMinutes[name]
				: undefined;
			return {
				name,
				height,
				dwellMinutes: minutes !== undefined && minutes > 0 ? minutes : null,
				toggle: togglePositions.includes(name),
			};
		},
	);

	if (summaries.length === 0) {
		context.formatter.write({
			text: [`No positions defined in ${configSource.configPath}`],
			data: {positions: []},
		});
		return 0;
	}

	const rows = [
		['NAME', 'HEIGHT', 'DWELL', 'TOGGLE'],
		...summaries.map(summary => [
			summary.name,
			`${summary.height}m`,
			summary.dwellMinutes === null ? '-' : `${summary.dwellMinutes} min`,
			summary.toggle ? 'yes' : '',
		]),
	];

	context.formatter.write({
		text: formatColumns(rows),
		data: {positions: summaries},
	});
	return 0;
}
