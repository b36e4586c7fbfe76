import {
	chmodSync,
	closeSync,
	constants,
	copyFileSync,
	existsSync,
	openSync,
	readSync,
	readdirSync,
	realpathSync,
	statSync,
	symlinkSync,
	unlinkSync,
	lstatSync,
} from 'fs';
import path from 'path';
import { createHash } from 'crypto';
import { CopyVerificationError, FileNotFoundError, KnownError } from './error.js';
import { padNumber } from './general.js';

const MEGABYTE = 2 ** 20;

export const fileExists = (filePath: string) => existsSync(filePath);

export const isFile = (filePath: string) =>
	statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;

export const isDirectory = (filePath: string) =>
	statSync(filePath, { throwIfNoEntry: false })?.isDirectory() ?? false;

const assertDirectory = (directory: string) => {
	if (!isDirectory(directory)) {
		throw new FileNotFoundError(directory, 'directory');
	}
};

const assertFile = (filePath: string) => {
	if (!isFile(filePath)) {
		throw new FileNotFoundError(filePath);
	}
};

/**
 * Sub-directories of `parentDir` that are not listed in `subdirs`, optionally
 * limited to names matching `pattern` (anchored at the start of the name).
 */
export const invertDirList = (
	parentDir: string,
	subdirs: readonly string[],
	pattern?: string | RegExp
): string[] => {
	assertDirectory(parentDir);

	const matcher =
		pattern === undefined
			? undefined
			: new RegExp(`^(?:${typeof pattern === 'string' ? pattern : pattern.source})`);

	return readdirSync(parentDir).filter(
		(name) =>
			isDirectory(path.join(parentDir, name)) &&
			!subdirs.includes(name) &&
			(!matcher || matcher.test(name))
	);
};

/** Rewrites a `/`-separated path with the platform separator. Does not touch the disk. */
export const convertUnixPathToOsPath = (unixPath: string) =>
	path.join(...unixPath.replace(/^\/+/, '').split('/'));

/** Paths that are not symlinks (or do not exist) are returned resolved but otherwise as-is. */
export const symlinksToRealPaths = (symlinks: readonly string[]) =>
	symlinks.map((symlink) =>
		existsSync(symlink) ? realpathSync(symlink) : path.resolve(symlink)
	);

export const listFilesRecursively = (directories: readonly string[]): string[] => {
	directories.forEach(assertDirectory);

	const output: string[] = [];
	const walk = (directory: string) => {
		for (const entry of readdirSync(directory, { withFileTypes: true })) {
			const entryPath = path.join(directory, entry.name);
			if (entry.isDirectory()) {
				walk(entryPath);
			} else {
				output.push(entryPath);
			}
		}
	};

	directories.forEach(walk);
	return output;
};

/** Hex md5 of a file, read `blockSize` bytes at a time. */
export const md5ForFile = (filePath: string, blockSize = MEGABYTE) => {
	assertFile(filePath);

	const hash = createHash('md5');
	const buffer = Buffer.alloc(blockSize);
	const descriptor = openSync(filePath, 'r');
	try {
		let bytesRead = readSync(descriptor, buffer, 0, blockSize, null);
		while (bytesRead > 0) {
			hash.update(buffer.subarray(0, bytesRead));
			bytesRead = readSync(descriptor, buffer, 0, blockSize, null);
		}
	} finally {
		closeSync(descriptor);
	}

	return hash.digest('hex');
};

/** Compares contents only (size first, then md5); names and timestamps are ignored. */
export const filesAreIdentical = (
	fileA: string,
	fileB: string,
	blockSize = MEGABYTE
) => {
	assertFile(fileA);
	assertFile(fileB);

	if (statSync(fileA).size !== statSync(fileB).size) {
		return false;
	}

	return md5ForFile(fileA, blockSize) === md5ForFile(fileB, blockSize);
};

/**
 * Copies `source` to `destination` (a file path, which must not exist yet)
 * and checks that both have the same md5.
 */
export const verifiedCopyFile = (source: string, destination: string) => {
	assertFile(source);
	assertDirectory(path.dirname(destination));

	copyFileSync(source, destination, constants.COPYFILE_EXCL);

	if (!filesAreIdentical(source, destination)) {
		throw new CopyVerificationError(source, destination);
	}
};

/** Files directly inside `directory`, grouped by size in bytes. */
export const dirFilesKeyedBySize = (directory: string): Map<number, string[]> => {
	assertDirectory(directory);

	const output = new Map<number, string[]>();
	for (const name of readdirSync(directory)) {
		const filePath = path.join(directory, name);
		const { size } = statSync(filePath);
		output.set(size, [...(output.get(size) ?? []), filePath]);
	}
	return output;
};

export type VersionedCopyOptions = {
	/** Name for the copy. Defaults to the source's name. */
	destName?: string;
	versionPrefix?: string;
	digits?: number;
	verify?: boolean;
};

/**
 * Copies `source` into `destDir` as `<base>.<prefix><number><ext>`, using the
 * first number not already taken. Returns the path of the copy.
 *
 * Not safe against another process copying into the same directory at the
 * same time.
 */
export const copyAndAddVersionNumber = (
	source: string,
	destDir: string,
	{
		destName = path.basename(source),
		versionPrefix = 'v',
		digits = 4,
		verify = false,
	}: VersionedCopyOptions = {}
): string => {
	assertFile(source);
	assertDirectory(destDir);

	const extension = path.extname(destName);
	const base = destName.slice(0, destName.length - extension.length);

	let version = 1;
	let destination = '';
	do {
		destination = path.join(
			destDir,
			`${base}.${versionPrefix}${padNumber(version, digits)}${extension}`
		);
		version += 1;
	} while (existsSync(destination));

	if (verify) {
		verifiedCopyFile(source, destination);
	} else {
		copyFileSync(source, destination);
	}

	return destination;
};

/**
 * Stores `source` in `dataDir` once per distinct content and links it into
 * `destDir` with a relative symlink. `dataSizes` is the result of
 * `dirFilesKeyedBySize(dataDir)`; it is updated when a new file is stored.
 *
 * Returns the path of the stored file in `dataDir`.
 */
export const copyFileDeduplicated = (
	source: string,
	destDir: string,
	dataDir: string,
	dataSizes: Map<number, string[]>,
	options: VersionedCopyOptions = {}
): string => {
	assertFile(source);
	assertDirectory(dataDir);
	assertDirectory(destDir);

	const resolvedDest = path.resolve(destDir);
	const resolvedData = path.resolve(dataDir);
	if (
		resolvedDest === resolvedData ||
		resolvedDest.startsWith(resolvedData + path.sep)
	) {
		throw new KnownError(`Destination ${destDir} may not be inside the data directory ${dataDir}`);
	}

	const destName = options.destName ?? path.basename(source);
	const { size } = statSync(source);
	const sourceMd5 = md5ForFile(source);

	const candidates = dataSizes.get(size) ?? [];
	let stored = candidates.find((candidate) => md5ForFile(candidate) === sourceMd5);

	if (!stored) {
		stored = copyAndAddVersionNumber(source, dataDir, { ...options, destName });
		dataSizes.set(size, [...candidates, stored]);
	}

	chmodSync(stored, 0o644);

	const link = path.join(resolvedDest, destName);
	if (lstatSync(link, { throwIfNoEntry: false })) {
		unlinkSync(link);
	}
	symlinkSync(
		path.join(path.relative(resolvedDest, resolvedData), path.basename(stored)),
		link
	);

	return stored;
};

/**
 * Walks up from the parent of `startDir` and returns the first ancestor that
 * contains any of `names`. `depth` limits how many levels are checked (1 is
 * the immediate parent only). The filesystem root is the last level checked.
 */
export const ancestorContainsFile = (
	startDir: string,
	names: string | readonly string[],
	depth?: number
): string | undefined => {
	assertDirectory(startDir);

	const candidates = typeof names === 'string' ? [names] : names;
	let current = path.dirname(path.resolve(startDir));
	let level = 0;

	for (;;) {
		const directory = current;
		if (candidates.some((name) => existsSync(path.join(directory, name)))) {
			return directory;
		}

		level += 1;
		if (depth !== undefined && level >= depth) {
			return undefined;
		}

		const parent = path.dirname(current);
		if (parent === current) {
			return undefined;
		}
		current = parent;
	}
};

/** Read and execute only. */
export const lockDir = (directory: string) => {
	assertDirectory(directory);
	chmodSync(directory, 0o555);
};

export const unlockDir = (directory: string) => {
	assertDirectory(directory);
	chmodSync(directory, 0o755);
};
