import { command } from 'cleye';
import { bold, dim } from 'kolorist';
import { loadConfig, type Config } from '../utils/config.js';
import { handleCommandError } from '../utils/error.js';

export const CONFIG_ENV_VAR = 'INIKIT_CONFIG';

/** Lines printed for `inikit config [section] [key]`. */
export const describeConfig = (
	config: Config,
	section?: string,
	key?: string
): string[] => {
	if (section && key) {
		return [config.get(section, key)];
	}

	if (section) {
		return config.items(section).map(([name, value]) => `${name}=${value}`);
	}

	return config.sections().flatMap((name) => [
		bold(`[${name}]`),
		...config.items(name).map(([itemKey, value]) => `${itemKey}=${value}`),
	]);
};

export default command(
	{
		name: 'config',
		description: 'Print sections and values of an ini configuration file',
		help: {
			description: `Print sections and values of an ini configuration file.\nThe file comes from --file, then $${CONFIG_ENV_VAR}, then ~/.config/inikit/config.ini`,
		},
		parameters: ['[section]', '[key]'],
		flags: {
			file: {
				type: String,
				description: 'Path to the configuration file',
				alias: 'f',
			},
			env: {
				type: String,
				description: `Environment variable holding the path (default: ${CONFIG_ENV_VAR})`,
				alias: 'e',
				default: CONFIG_ENV_VAR,
			},
		},
	},
	(argv) => {
		const [section, key] = argv._;

		try {
			const config = loadConfig({
				path: argv.flags.file,
				envVar: argv.flags.env,
				appName: 'inikit',
			});

			console.log(dim(config.path));
			for (const line of describeConfig(config, section, key)) {
				console.log(line);
			}
		} catch (error) {
			handleCommandError(error);
		}
	}
);
