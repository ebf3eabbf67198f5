import {Effect, Either} from 'effect';
import {formatAppError} from '../../types/errors.js';
import {expandTilde} from '../../utils/paths.js';
import type {CliCommandContext} from '../types.js';

function describeDwell(dwellMinutes: Record<string, number>): string {
	const entries = Object.entries(dwellMinutes);
	if (entries.length === 0) {
		return 'none';
	}
	return entries.map(([name, minutes]) => `${name}=${minutes}min`).join(', ');
}

export async function runConfigCommand(
	context: CliCommandContext,
): Promise<number> {
	const {configurationManager, formatter} = context;

	if (context.subcommand === 'init') {
		const result = await Effect.runPromise(
			Effect.either(configurationManager.writeDefaultsEffect()),
		);
		if (Either.isLeft(result)) {
			const message = formatAppError(result.left);
			formatter.writeError({
				text: [`Error: ${message}`],
				data: {error: result.left._tag, message},
			});
			return 1;
		}

		formatter.write({
			text: [`Wrote configuration to ${configurationManager.getConfigPath()}`],
			data: {
				configPath: configurationManager.getConfigPath(),
				configuration: result.right,
			},
		});
		return 0;
	}

	const configuration = configurationManager.getConfiguration();
	const {nagging, desk} = configuration;
	formatter.write({
		text: [
			`Config file:     ${configurationManager.getConfigPath()}${configurationManager.hasConfigFile() ? '' : ' (not created, using defaults)'}`,
			`Config dir:      ${context.configDir}${context.customConfigDir ? ' (custom)' : ''}`,
			`Desk config:     ${expandTilde(desk.configPath)}`,
			`Desk command:    ${desk.command} <position>`,
			`Nagging:         ${nagging.enabled ? 'enabled' : 'disabled'}`,
			`Dwell times:     ${describeDwell(nagging.dwellMinutes)}`,
			`Toggle between:  ${nagging.togglePositions.join(' <-> ')}`,
			`Log level:       ${configuration.logLevel}`,
		],
		data: {
			configPath: configurationManager.getConfigPath(),
			configDir: context.configDir,
			configuration,
		},
	});
	return 0;
}
