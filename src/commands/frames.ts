import { command } from 'cleye';
import { log } from '@clack/prompts';
import { yellow } from 'kolorist';
import { handleCommandError } from '../utils/error.js';
import { expandFiles, expandFrameSequence } from '../utils/framespec.js';

export default command(
	{
		name: 'frames',
		description: 'Expand a frame sequence pattern such as shot.1-10x2.exr',
		parameters: ['<pattern>'],
		flags: {
			padding: {
				type: Number,
				description: 'Digits to pad frame numbers to (0: widest frame)',
				alias: 'p',
			},
			files: {
				type: Boolean,
				description: 'List matching files on disk and report missing frames',
				default: false,
			},
		},
	},
	(argv) => {
		const { pattern } = argv._;
		const { padding } = argv.flags;

		try {
			if (!argv.flags.files) {
				for (const name of expandFrameSequence(pattern, padding)) {
					console.log(name);
				}
				return;
			}

			const { files, missing } = expandFiles(pattern, { padding });
			for (const file of files) {
				console.log(file);
			}
			if (missing.length > 0) {
				log.warn(`Missing frames: ${yellow(missing.join(', '))}`);
			}
		} catch (error) {
			handleCommandError(error);
		}
	}
);
