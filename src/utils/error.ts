import { dim, red } from 'kolorist';
import { outro } from '@clack/prompts';
import { version } from './package.js';

export class KnownError extends Error {}

export class FileNotFoundError extends KnownError {
	constructor(readonly filePath: string, label = 'file') {
		super(`Cannot locate ${label}: ${filePath}`);
	}
}

export class FileReadError extends KnownError {
	constructor(readonly filePath: string, reason: string) {
		super(`Cannot read ${filePath}: ${reason}`);
	}
}

export class IniParseError extends KnownError {
	constructor(
		readonly filePath: string,
		readonly line: number,
		reason: string
	) {
		super(`${filePath}:${line}: ${reason}`);
	}
}

export class MissingSectionError extends KnownError {
	constructor(readonly filePath: string, readonly section: string) {
		super(`No section [${section}] in ${filePath}`);
	}
}

export class MissingKeyError extends KnownError {
	constructor(
		readonly filePath: string,
		readonly section: string,
		readonly key: string
	) {
		super(`No key "${key}" in section [${section}] of ${filePath}`);
	}
}

export class InvalidValueError extends KnownError {
	constructor(
		readonly section: string,
		readonly key: string,
		readonly value: string,
		expected: string
	) {
		super(`Invalid value for [${section}] ${key}: expected ${expected}, got "${value}"`);
	}
}

export class CopyVerificationError extends KnownError {
	constructor(readonly source: string, readonly destination: string) {
		super(`Verification of copy failed (md5 checksums do not match): ${source} --> ${destination}`);
	}
}

/**
 * Failure while turning resource definitions into a parser, or while parsing
 * argv with it. `code` is the key of the message in the bundled options
 * resources.
 */
export class OptionsError extends KnownError {
	constructor(readonly code: number, message: string) {
		super(message);
	}
}

const indent = '    ';

export const handleCliError = (error: unknown) => {
	if (error instanceof Error && !(error instanceof KnownError)) {
		if (error.stack) {
			console.error(dim(error.stack.split('\n').slice(1).join('\n')));
		}
		console.error(`\n${indent}${dim(`inikit v${version}`)}`);
		console.error(
			`\n${indent}This is a bug. Please report it with the information above.`
		);
	}
};

export const errorMessage = (error: unknown) =>
	error instanceof Error ? error.message : String(error);

export const handleCommandError = (error: unknown): never => {
	outro(`${red('✖')} ${errorMessage(error)}`);
	handleCliError(error);
	process.exit(1);
};
