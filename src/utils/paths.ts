import path from 'path';
import os from 'os';
import { KnownError } from './error.js';

// --- XDG helpers ---

function xdgConfigHome(): string {
	const env = process.env.XDG_CONFIG_HOME;
	if (env && path.isAbsolute(env)) return env;
	return path.join(os.homedir(), '.config');
}

// --- Public API ---

/** Directory for user-level config: $XDG_CONFIG_HOME/<appName> */
export function getConfigDir(appName: string): string {
	return path.join(xdgConfigHome(), appName);
}

/** User-level config file: $XDG_CONFIG_HOME/<appName>/config.ini */
export function getConfigFilePath(appName: string): string {
	return path.join(getConfigDir(appName), 'config.ini');
}

export type FileLocation = {
	/** Explicit path. Wins over everything else when given. */
	path?: string;

	/** Name of an environment variable holding the path. */
	envVar?: string;

	/** Used when neither of the above yields a path. */
	fallback?: string;
};

/**
 * Resolve the path of a file to load.
 * Priority: explicit path > $envVar (when set and non-empty) > fallback
 */
export function resolveFilePath(location: FileLocation): string {
	if (location.path) {
		return path.resolve(location.path);
	}

	if (location.envVar) {
		const fromEnv = process.env[location.envVar];
		if (fromEnv) {
			return path.resolve(fromEnv);
		}
	}

	if (location.fallback) {
		return path.resolve(location.fallback);
	}

	const hint = location.envVar ? ` or set $${location.envVar}` : '';
	throw new KnownError(`No file path given. Pass a path${hint}.`);
}
