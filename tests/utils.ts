import path from 'path';
import { createFixture as createFixtureBase } from 'fs-fixture';

type FixtureSource = Parameters<typeof createFixtureBase>[0];

export const createFixture = async (source?: FixtureSource) => {
	const fixture = await createFixtureBase(source);

	return {
		fixture,
		file: (...segments: string[]) => path.join(fixture.path, ...segments),
	};
};

export const lines = (...values: string[]) => values.join('\n');

/** Runs `callback` with the given environment variables, restoring them afterwards. */
export const withEnv = <T>(
	variables: Record<string, string | undefined>,
	callback: () => T
): T => {
	const previous = Object.fromEntries(
		Object.keys(variables).map((name) => [name, process.env[name]])
	);

	const apply = (values: Record<string, string | undefined>) => {
		for (const [name, value] of Object.entries(values)) {
			if (value === undefined) {
				delete process.env[name];
			} else {
				process.env[name] = value;
			}
		}
	};

	apply(variables);
	try {
		return callback();
	} finally {
		apply(previous);
	}
};

export const catchError = (callback: () => unknown): unknown => {
	try {
		callback();
	} catch (error) {
		return error;
	}
	return undefined;
};
