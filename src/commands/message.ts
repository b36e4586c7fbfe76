import { command } from 'cleye';
import { handleCommandError, KnownError } from '../utils/error.js';
import {
	DEFAULT_LANGUAGE,
	loadResources,
	type Resources,
} from '../utils/resources.js';

export const RESOURCES_ENV_VAR = 'INIKIT_RESOURCES';

export const lookupMessage = (
	resources: Resources,
	key: string,
	isErrorCode: boolean
) => {
	if (!isErrorCode) {
		return resources.message(key);
	}

	if (!/^\d+$/.test(key)) {
		throw new KnownError(`Error codes are numeric, got: ${key}`);
	}

	const { code, message } = resources.error(Number(key));
	return `${code}: ${message}`;
};

export default command(
	{
		name: 'message',
		description: 'Print a localized message from a resource file',
		parameters: ['<key>'],
		flags: {
			dir: {
				type: String,
				description: `Resources directory (default: $${RESOURCES_ENV_VAR})`,
				alias: 'd',
			},
			prefix: {
				type: String,
				description: 'Resource file prefix, as in <prefix>_resources_<language>.ini',
				alias: 'p',
				default: 'inikit',
			},
			language: {
				type: String,
				description: `Language of the resource file (default: ${DEFAULT_LANGUAGE})`,
				alias: 'l',
				default: DEFAULT_LANGUAGE,
			},
			error: {
				type: Boolean,
				description: 'Treat the key as an error code',
				default: false,
			},
		},
	},
	(argv) => {
		try {
			const resources = loadResources({
				directory: argv.flags.dir,
				directoryEnvVar: RESOURCES_ENV_VAR,
				prefix: argv.flags.prefix,
				language: argv.flags.language,
			});

			console.log(lookupMessage(resources, argv._.key, argv.flags.error));
		} catch (error) {
			handleCommandError(error);
		}
	}
);
