import {Either} from 'effect';
import {formatAppError} from '../../types/errors.js';
import type {CliCommandContext} from '../types.js';

/**
 * One-shot move: validate the position and start the desk command, without
 * waiting for the desk or arming a dwell timer.
 */
export async function runMoveCommand(
	context: CliCommandContext,
): Promise<number> {
	const position = context.parsedArgs.input[1];
	if (!position) {
		context.formatter.writeError({
			text: ['Usage: deskflip move <position>'],
			data: {error: 'MissingPosition', message: 'A position name is required'},
		});
		return 1;
	}

	const {controller} = context.createRuntime({naggingEnabled: false});
	const result = await controller.requestPositionChange(position);
	await controller.dispose();

	if (Either.isLeft(result)) {
		const message = formatAppError(result.left);
		context.formatter.writeError({
			text: [`Error: ${message}`],
			data: {error: result.left._tag, message},
		});
		return 1;
	}

	context.formatter.write({
		text: [`Moving desk to ${position}`],
		data: {position, outcome: result.right},
	});
	return 0;
}
