import type {ConfigurationManager} from '../services/configurationManager.js';
import type {
	CreateDeskRuntimeOptions,
	DeskRuntime,
} from '../services/deskRuntime.js';
import type {OutputFormatter} from './formatter.js';

export interface CliFlags {
	log: boolean;
	nag: boolean;
	json: boolean;
}

export interface ParsedCliArgs {
	input: string[];
	flags: CliFlags;
}

export interface CliCommandContext {
	subcommand: string;
	parsedArgs: ParsedCliArgs;
	formatter: OutputFormatter;
	configDir: string;
	customConfigDir: boolean;
	configurationManager: ConfigurationManager;
	createRuntime: (options?: CreateDeskRuntimeOptions) => DeskRuntime;
}

export type CliCommandHandler = (context: CliCommandContext) => Promise<number>;
