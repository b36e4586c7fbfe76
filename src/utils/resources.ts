import path from 'path';
import {
	black,
	blue,
	cyan,
	gray,
	green,
	lightBlue,
	lightCyan,
	lightGray,
	lightGreen,
	lightMagenta,
	lightRed,
	lightYellow,
	magenta,
	red,
	white,
	yellow,
} from 'kolorist';
import { IniFile, readIniFile } from './ini.js';
import { resolveFilePath } from './paths.js';
import { formatMultiLine } from './general.js';

export const DEFAULT_LANGUAGE = 'english';

export const MESSAGES_SECTION = 'messages';
export const ERROR_CODES_SECTION = 'error_codes';
export const DESCRIPTION_SECTION = 'description';
export const USAGE_SECTION = 'usage';

type Painter = (text: string) => string;

const plain: Painter = (text) => text;

const colorTags: Partial<Record<string, Painter>> = {
	BLACK: black,
	RED: red,
	GREEN: green,
	YELLOW: yellow,
	BLUE: blue,
	MAGENTA: magenta,
	CYAN: cyan,
	WHITE: lightGray,
	GRAY: gray,
	BRIGHT_RED: lightRed,
	BRIGHT_GREEN: lightGreen,
	BRIGHT_YELLOW: lightYellow,
	BRIGHT_BLUE: lightBlue,
	BRIGHT_MAGENTA: lightMagenta,
	BRIGHT_CYAN: lightCyan,
	BRIGHT_WHITE: white,
	NONE: plain,
};

const colorTagPattern = /\{\{COLOR_([A-Z_]+)\}\}/g;

/**
 * Turns literal `\n` sequences into newlines and applies `{{COLOR_<NAME>}}`
 * tags: each tag colors the text up to the next tag, `{{COLOR_NONE}}` stops
 * coloring. Unknown tags are kept as written.
 */
export const formatString = (text: string) => {
	const source = text.replace(/\\n/g, '\n');

	let output = '';
	let paint = plain;
	let cursor = 0;

	for (const match of source.matchAll(colorTagPattern)) {
		const start = match.index ?? 0;
		const painter = colorTags[match[1]];

		if (!painter) {
			continue;
		}

		const segment = source.slice(cursor, start);
		if (segment) {
			output += paint(segment);
		}
		paint = painter;
		cursor = start + match[0].length;
	}

	const rest = source.slice(cursor);
	return rest ? output + paint(rest) : output;
};

export type InterpolationValues = Record<string, string | number>;

/** Fills `{name}` placeholders; unknown names are left in place. */
export const interpolate = (template: string, values: InterpolationValues = {}) =>
	template.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
		name in values ? String(values[name]) : placeholder
	);

export type CodedMessage = {
	code: number;
	message: string;
};

export const resourcesFileName = (prefix: string, language = DEFAULT_LANGUAGE) =>
	`${prefix}_resources_${language}.ini`;

/**
 * Localized strings and argument definitions for one tool, read from
 * `<directory>/<prefix>_resources_<language>.ini`.
 */
export class Resources extends IniFile {
	readonly language: string;

	constructor(directory: string, prefix: string, language = DEFAULT_LANGUAGE) {
		const filePath = path.join(directory, resourcesFileName(prefix, language));
		super(filePath, readIniFile(filePath, 'resource file'));
		this.language = language;
	}

	message(key: string, values?: InterpolationValues): string {
		return interpolate(formatString(this.get(MESSAGES_SECTION, key)), values);
	}

	error(code: number, values?: InterpolationValues): CodedMessage {
		return {
			code,
			message: interpolate(
				formatString(this.get(ERROR_CODES_SECTION, String(code))),
				values
			),
		};
	}

	/** Lines of the [description] section joined into one string. */
	description(): string | undefined {
		return this.multiLine(DESCRIPTION_SECTION);
	}

	usage(): string | undefined {
		return this.multiLine(USAGE_SECTION);
	}

	// Bare lines are text as written; `key = value` lines contribute the value.
	// DEFAULT keys are not part of the text.
	private multiLine(section: string) {
		if (!this.data.sections.has(section)) {
			return undefined;
		}

		const lines = this.data.lines.get(section) ?? [];
		return formatString(
			formatMultiLine(lines.map(({ key, value }) => value ?? key))
		);
	}
}

export type ResourcesLocation = {
	prefix: string;
	directory?: string;

	/** Environment variable holding the resources directory. */
	directoryEnvVar?: string;
	language?: string;
};

export const loadResources = ({
	prefix,
	directory,
	directoryEnvVar,
	language,
}: ResourcesLocation) =>
	new Resources(
		resolveFilePath({ path: directory, envVar: directoryEnvVar }),
		prefix,
		language
	);
