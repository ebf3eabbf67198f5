#!/usr/bin/env node
import React from 'react';
import {render} from 'ink';
import meow from 'meow';
import {join} from 'path';
import App from './components/App.js';
import {resolveConfigDir} from './utils/configDir.js';
import {logger} from './utils/logger.js';
import {ConfigurationManager} from './services/configurationManager.js';
import {createDeskRuntime} from './services/deskRuntime.js';
import {
	getRegisteredCommands,
	runRegisteredCommand,
} from './cli/commands/index.js';
import {OutputFormatter} from './cli/formatter.js';
import {LOG_FILENAME} from './constants/desk.js';

const cli = meow(
	`
	Usage
	  $ deskflip                     Open the position menu
	  $ deskflip positions           List positions from the desk configuration
	  $ deskflip move <position>     Move the desk once and exit
	  $ deskflip config              Show effective settings
	  $ deskflip init                Write settings with defaults to config.json

	Options
	  --help        Show help
	  --version     Show version
	  --log         Also write log output to deskflip.log in the config directory
	  --no-nag      Never toggle position after the dwell time
	  --json        Print command output as JSON

	Examples
	  $ deskflip
	  $ deskflip --no-nag --log
	  $ deskflip move stand
`,
	{
		importMeta: import.meta,
		flags: {
			log: {
				type: 'boolean',
				default: false,
			},
			nag: {
				type: 'boolean',
				default: true,
			},
			json: {
				type: 'boolean',
				default: false,
			},
		},
	},
);

const configDirInfo = resolveConfigDir();
const configDir = configDirInfo.dir;
const subcommand = cli.input[0];

// The Ink menu owns the terminal, so it only logs to file
logger.configure({
	console: subcommand !== undefined,
	filePath: cli.flags.log ? join(configDir, LOG_FILENAME) : null,
});

const configurationManager = new ConfigurationManager(configDir);
logger.configure({level: configurationManager.getConfiguration().logLevel});

// --no-nag can only switch nagging off, config.json decides otherwise
const naggingEnabled = cli.flags.nag ? undefined : false;

if (subcommand !== undefined) {
	const exitCode = await runRegisteredCommand({
		subcommand,
		parsedArgs: {input: cli.input, flags: cli.flags},
		formatter: new OutputFormatter(cli.flags.json),
		configDir,
		customConfigDir: configDirInfo.custom,
		configurationManager,
		createRuntime: options =>
			createDeskRuntime(configurationManager, {naggingEnabled, ...options}),
	});

	if (exitCode === undefined) {
		console.error(
			`Error: Unknown command "${subcommand}". Available commands: ${getRegisteredCommands().join(', ')}`,
		);
		process.exitCode = 1;
	} else {
		process.exitCode = exitCode;
	}
} else {
	if (!process.stdin.isTTY || !process.stdout.isTTY) {
		console.error(
			'Error: deskflip must be run in an interactive terminal (TTY). Use `deskflip move <position>` in scripts.',
		);
		process.exit(1);
	}

	logger.info('Starting...');
	const runtime = createDeskRuntime(configurationManager, {naggingEnabled});
	// Ctrl+C arrives as input while the menu holds raw mode; the menu handles it
	const app = render(
		<App runtime={runtime} isDevMode={configDirInfo.devMode} />,
		{exitOnCtrlC: false},
	);

	const shutdown = () => {
		void runtime.controller.dispose().finally(() => {
			app.unmount();
			logger.info('Stopping...');
			process.exit(0);
		});
	};
	process.on('SIGINT', shutdown);
	process.on('SIGTERM', shutdown);

	await app.waitUntilExit();
	await runtime.controller.dispose();
	logger.info('Stopping...');
}
