import { IniFile, readIniFile } from './ini.js';
import { getConfigFilePath, resolveFilePath } from './paths.js';
import { KnownError } from './error.js';

export type ConfigOptions = {
	/** Explicit path to the config file. */
	path?: string;

	/** Environment variable holding the path, used when `path` is not given. */
	envVar?: string;

	/** Falls back to $XDG_CONFIG_HOME/<appName>/config.ini. */
	appName?: string;
};

/**
 * A configuration file loaded once at startup. Values are looked up with the
 * `IniFile` getters; the file is never written back.
 */
export class Config extends IniFile {
	constructor(filePath: string) {
		super(filePath, readIniFile(filePath, 'config file'));
	}
}

export const resolveConfigPath = ({ path, envVar, appName }: ConfigOptions) => {
	if (!path && !envVar && !appName) {
		throw new KnownError('A config path, environment variable or app name is required');
	}

	return resolveFilePath({
		path,
		envVar,
		fallback: appName ? getConfigFilePath(appName) : undefined,
	});
};

export const loadConfig = (options: ConfigOptions) =>
	new Config(resolveConfigPath(options));
