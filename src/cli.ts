#!/usr/bin/env node
import { cli } from 'cleye';
import { description, version } from './utils/package.js';
import configCommand from './commands/config.js';
import messageCommand from './commands/message.js';
import framesCommand from './commands/frames.js';

cli(
	{
		name: 'inikit',
		version,
		commands: [configCommand, messageCommand, framesCommand],
		help: {
			description,
		},
	},
	(argv) => {
		argv.showHelp();
	}
);
