import { readdirSync } from 'fs';
import path from 'path';
import { KnownError } from './error.js';
import { escapeRegExp, padNumber } from './general.js';
import { isDirectory } from './fs.js';

/** Text before a match, the match (or its regex), and the text after it. */
export type Split = [prefix: string, match: string, suffix: string];

export const DEFAULT_UDIM_IDENTIFIER = '<UDIM>';

// A frame spec sits between dots (or at the start/end) and may end in a run
// of # or @ padding markers: 1-10x2,20,30,32-40##
const frameSpecPattern =
	/(?:(?<=\.)|(?<=^))(?:(?:(?<!\.),)?\d+(?:-\d+(?:[x:]-?\d+)?)?)+(?:@+|#+)?(?=\.|$)/g;

const frameRangePattern = /(\d+)(?:-(\d+)(?:[x:](-?\d+))?)?/g;

const splitPath = (filePath: string): [directory: string, name: string] => {
	const index = filePath.lastIndexOf(path.sep);
	if (index === -1) {
		return ['', filePath];
	}
	return [filePath.slice(0, index) || path.sep, filePath.slice(index + 1)];
};

const joinPath = (directory: string, name: string) =>
	directory ? path.join(directory, name) : name;

/**
 * Splits `value` around the first UDIM identifier, replacing the identifier
 * with a regex. With `strict`, a UDIM is four digits starting at 1001;
 * otherwise anything may follow the first four digits.
 */
export const udimIdToRegex = (
	value: string,
	udimIdentifier = DEFAULT_UDIM_IDENTIFIER,
	strict = true
): Split => {
	const index = value.indexOf(udimIdentifier);
	if (index === -1) {
		return [value, '', ''];
	}

	return [
		value.slice(0, index),
		strict ? '[1-9]\\d{3}' : '[1-9]\\d{3}.*',
		value.slice(index + udimIdentifier.length),
	];
};

/**
 * Splits `value` around the first sequence identifier: a printf token
 * (`.%04d`) or a run of hashes after a dot or underscore (`.####`). The
 * printf form wins when both are present.
 *
 * With `matchHashLength`, `###` only matches three digits; otherwise any
 * number of digits. Printf tokens always fix the width.
 */
export const seqIdToRegex = (value: string, matchHashLength = false): Split => {
	const printf = /[._](%(\d+)d)/.exec(value);
	if (printf) {
		const [, token, width] = printf;
		const index = value.indexOf(token);
		return [
			value.slice(0, index),
			`\\d{${Number(width)}}`,
			value.slice(index + token.length),
		];
	}

	const hashes = /([._])(#+)/.exec(value);
	if (hashes) {
		const [whole, delimiter, run] = hashes;
		const index = hashes.index;
		const width = matchHashLength ? `{${run.length}}` : '+';
		return [
			value.slice(0, index),
			`${escapeRegExp(delimiter)}\\d${width}`,
			value.slice(index + whole.length),
		];
	}

	return [value, '', ''];
};

/**
 * Converts a path that may hold a UDIM identifier and/or a sequence
 * identifier into a regex source matching the files it stands for:
 * `/tmp/file_<UDIM>.####.exr` → `/tmp/file_[1-9]\d{3}\.\d+\.exr`.
 */
export const seqAndUdimIdsToRegex = (
	filePath: string,
	matchHashLength = false,
	udimIdentifier = DEFAULT_UDIM_IDENTIFIER,
	strictUdim = true
) => {
	const [directory, name] = splitPath(filePath);
	const [beforeUdim, udim, afterUdim] = udimIdToRegex(name, udimIdentifier, strictUdim);
	const [prefixHead, prefixSeq, prefixTail] = seqIdToRegex(beforeUdim, matchHashLength);
	const [suffixHead, suffixSeq, suffixTail] = seqIdToRegex(afterUdim, matchHashLength);

	return [
		escapeRegExp(joinPath(directory, prefixHead)),
		prefixSeq,
		escapeRegExp(prefixTail),
		udim,
		escapeRegExp(suffixHead),
		suffixSeq,
		escapeRegExp(suffixTail),
	].join('');
};

/**
 * Finds the last frame spec in a file name:
 * `shot.1-10x2,20.tif` → `['shot.', '1-10x2,20', '.tif']`.
 */
export const findFrameSpec = (value: string): Split => {
	let last: RegExpMatchArray | undefined;
	for (const match of value.matchAll(frameSpecPattern)) {
		last = match;
	}

	if (!last || last.index === undefined) {
		return [value, '', ''];
	}

	const start = last.index;
	const end = start + last[0].length;
	return [value.slice(0, start), last[0], value.slice(end)];
};

/**
 * Frame numbers a spec stands for, sorted and unique:
 * `1-5x2,8` → `[1, 3, 5, 8]`. A range counts down with a negative step
 * (`10-1x-1`); a range running against its step is empty.
 */
export const expandFrameSpec = (frameSpec: string): number[] => {
	const frames = new Set<number>();

	for (const part of frameSpec.split(',')) {
		for (const match of part.matchAll(frameRangePattern)) {
			const [, startText, endText, stepText] = match;
			const start = Number(startText);
			const end = endText === undefined ? start : Number(endText);
			const step = stepText === undefined ? 1 : Number(stepText);

			if (step === 0) {
				throw new KnownError(`Frame step cannot be zero: ${part}`);
			}

			for (
				let frame = start;
				step > 0 ? frame <= end : frame >= end;
				frame += step
			) {
				frames.add(frame);
			}
		}
	}

	return [...frames].sort((a, b) => a - b);
};

/**
 * Padding width for expanded frame numbers.
 *
 * - an explicit `padding` above 0 is used as is
 * - `padding` 0 pads to the widest frame
 * - otherwise the count of `#` (or `@`) markers in the spec, or 1
 */
export const calcPadding = (
	frames: readonly number[],
	frameSpec?: string,
	padding?: number
): number => {
	if (padding !== undefined && padding > 0) {
		return padding;
	}

	if (padding === 0) {
		return frames.length > 0 ? String(Math.max(...frames)).length : 1;
	}

	const markers = frameSpec?.match(/#+|@+/);
	return markers ? markers[0].length : 1;
};

/**
 * Expands `name.1-3.exr` into `name.1.exr`, `name.2.exr`, `name.3.exr`.
 * Names without a frame spec come back unchanged. Does not touch the disk.
 */
export const expandFrameSequence = (fileName: string, padding?: number): string[] => {
	const [directory, name] = splitPath(fileName);
	const [prefix, frameSpec, suffix] = findFrameSpec(name);
	const frames = expandFrameSpec(frameSpec);

	if (frames.length === 0) {
		return [fileName];
	}

	const width = calcPadding(frames, frameSpec, padding);
	return frames.map((frame) =>
		joinPath(directory, `${prefix}${padNumber(frame, width)}${suffix}`)
	);
};

export type ExpandFilesOptions = {
	padding?: number;
	udimIdentifier?: string;
	strictUdim?: boolean;
	matchHashLength?: boolean;
};

export type ExpandedFiles = {
	files: string[];

	/** Frames of the spec with no matching file, padded. */
	missing: string[];
};

/**
 * Lists the files on disk that a user pattern stands for. The pattern may
 * combine a frame spec, a UDIM identifier and a sequence identifier:
 * `/tmp/plate_%03d_<UDIM>.1-3.exr`.
 *
 * Without an explicit padding, frame numbers match with any number of
 * leading zeros.
 */
export const expandFiles = (
	pattern: string,
	{
		padding,
		udimIdentifier = DEFAULT_UDIM_IDENTIFIER,
		strictUdim = true,
		matchHashLength = false,
	}: ExpandFilesOptions = {}
): ExpandedFiles => {
	const absolute = path.resolve(pattern);
	const directory = path.dirname(absolute);
	const name = path.basename(absolute);

	if (!isDirectory(directory)) {
		throw new KnownError(`Cannot locate directory: ${directory}`);
	}

	const [prefix, frameSpec, suffix] = findFrameSpec(name);
	const frames = frameSpec && suffix ? expandFrameSpec(frameSpec) : [];
	const width = calcPadding(frames, frameSpec, padding);

	if (frames.length === 0) {
		return { files: [absolute], missing: [] };
	}

	const toRegex = (value: string) =>
		seqAndUdimIdsToRegex(value, matchHashLength, udimIdentifier, strictUdim);
	const prefixPattern = toRegex(prefix);
	const suffixPattern = toRegex(suffix);
	const entries = readdirSync(directory);

	const files: string[] = [];
	const missing: number[] = [];

	for (const frame of frames) {
		const framePattern = padding ? padNumber(frame, width) : `0*${frame}`;
		const matcher = new RegExp(`^${prefixPattern}${framePattern}${suffixPattern}$`);
		const matches = entries.filter((entry) => matcher.test(entry));

		if (matches.length === 0) {
			missing.push(frame);
		}
		files.push(...matches.map((entry) => path.join(directory, entry)));
	}

	return {
		files: files.sort(),
		missing: missing.map((frame) => padNumber(frame, width)),
	};
};
