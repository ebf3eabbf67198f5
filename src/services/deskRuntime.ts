import {
	ConfigSource,
	DeskMover,
	ResolvedConfiguration,
} from '../types/index.js';
import {ConfigurationManager} from './configurationManager.js';
import {IdasenConfigSource} from './idasenConfigSource.js';
import {IdasenDeskMover} from './idasenDeskMover.js';
import {PositionController} from './positionController.js';

export interface DeskRuntime {
	configuration: ResolvedConfiguration;
	configSource: ConfigSource;
	deskMover: DeskMover;
	controller: PositionController;
}

export interface CreateDeskRuntimeOptions {
	naggingEnabled?: boolean; // Overrides nagging.enabled from config.json
	configSource?: ConfigSource;
	deskMover?: DeskMover;
}

/**
 * Wire the desk collaborators and a PositionController from settings.
 */
export function createDeskRuntime(
	configurationManager: ConfigurationManager,
	options: CreateDeskRuntimeOptions = {},
): DeskRuntime {
	const configuration = configurationManager.getConfiguration();
	const configSource =
		options.configSource ??
		new IdasenConfigSource(configuration.desk.configPath);
	const deskMover =
		options.deskMover ?? new IdasenDeskMover(configuration.desk.command);

	const controller = new PositionController({
		configSource,
		deskMover,
		dwellPolicy: configurationManager.getDwellPolicy(),
		naggingEnabled: options.naggingEnabled ?? configuration.nagging.enabled,
		togglePositions: configuration.nagging.togglePositions,
	});

	return {configuration, configSource, deskMover, controller};
}
