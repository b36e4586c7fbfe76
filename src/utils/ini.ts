import { readFileSync } from 'fs';
import ini from 'ini';
import {
	FileNotFoundError,
	FileReadError,
	IniParseError,
	InvalidValueError,
	MissingKeyError,
	MissingSectionError,
	errorMessage,
} from './error.js';
import { isFile } from './fs.js';

/** Section whose keys every other section falls back to. */
export const DEFAULT_SECTION = 'DEFAULT';

export type IniSection = Record<string, string>;

/** One `key = value` line, or a bare line (`value` undefined), in file order. */
export type IniLine = {
	key: string;
	value?: string;
};

export type IniData = {
	defaults: IniSection;
	sections: Map<string, IniSection>;

	/** Lines of each section as written, for sections holding free text. */
	lines: Map<string, IniLine[]>;
};

const { hasOwnProperty } = Object.prototype;
const hasOwn = (object: unknown, key: PropertyKey) =>
	hasOwnProperty.call(object, key);

const sectionHeaderPattern = /^\[([^\]]+)\]$/;

const booleanWords: Record<string, boolean> = {
	'1': true,
	yes: true,
	true: true,
	on: true,
	'0': false,
	no: false,
	false: false,
	off: false,
};

/** `1/yes/true/on` and `0/no/false/off`, case-insensitive. */
export const parseBooleanWord = (value: string): boolean | undefined => {
	const word = value.trim().toLowerCase();
	return hasOwn(booleanWords, word) ? booleanWords[word] : undefined;
};

type ScannedText = {
	sectionNames: string[];
	lines: Map<string, IniLine[]>;

	/** The input with every name and value JSON-quoted. */
	quoted: string;
};

/**
 * `ini` accepts anything: a broken header becomes a key, a repeated key
 * overwrites the first, and `;`, `#` or quotes inside a value are taken as
 * comments or stripped. Reject the first two up front, and hand `ini` every
 * name and value JSON-quoted so values come back exactly as written.
 */
const scanLines = (text: string, source: string): ScannedText => {
	const sectionNames: string[] = [];
	const lines = new Map<string, IniLine[]>();
	const keysBySection = new Map<string, Set<string>>();
	const quoted: string[] = [];
	let section = DEFAULT_SECTION;

	text.split(/\r?\n/).forEach((raw, index) => {
		const line = raw.trim();
		const lineNumber = index + 1;

		if (!line || line.startsWith(';') || line.startsWith('#')) {
			return;
		}

		if (line.startsWith('[')) {
			const match = sectionHeaderPattern.exec(line);
			if (!match || !raw.startsWith('[')) {
				throw new IniParseError(source, lineNumber, `Malformed section header: ${line}`);
			}

			section = match[1].trim();
			if (section !== DEFAULT_SECTION && !sectionNames.includes(section)) {
				sectionNames.push(section);
			}
			quoted.push(`[${JSON.stringify(section)}]`);
			return;
		}

		const separator = line.indexOf('=');
		const key = (separator === -1 ? line : line.slice(0, separator)).trim();
		if (!key) {
			throw new IniParseError(source, lineNumber, 'Missing key before "="');
		}
		const value = separator === -1 ? undefined : line.slice(separator + 1).trim();

		quoted.push(
			value === undefined
				? JSON.stringify(key)
				: `${JSON.stringify(key)} = ${JSON.stringify(value)}`
		);

		// key[] lines accumulate into a list
		if (key.endsWith('[]')) {
			return;
		}

		const seen = keysBySection.get(section) ?? new Set<string>();
		if (seen.has(key)) {
			throw new IniParseError(
				source,
				lineNumber,
				`Duplicate key "${key}" in section [${section}]`
			);
		}
		seen.add(key);
		keysBySection.set(section, seen);
		lines.set(section, [...(lines.get(section) ?? []), { key, value }]);
	});

	return {
		sectionNames,
		lines,
		quoted: quoted.join('\n'),
	};
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value);

const toText = (value: unknown): string | undefined => {
	if (typeof value === 'string') {
		return value;
	}
	if (typeof value === 'boolean' || typeof value === 'number') {
		return String(value);
	}
	if (value === null) {
		return 'null';
	}
	if (Array.isArray(value)) {
		return value.map((item) => toText(item) ?? '').join(',');
	}
	return undefined;
};

// `ini` nests [a.b] under a; flatten back to dotted names.
const collectSections = (
	node: Record<string, unknown>,
	name: string,
	into: Map<string, IniSection>
) => {
	const section: IniSection = {};

	for (const [key, value] of Object.entries(node)) {
		if (isRecord(value)) {
			collectSections(value, name ? `${name}.${key}` : key, into);
			continue;
		}

		const text = toText(value);
		if (text !== undefined) {
			section[key] = text;
		}
	}

	into.set(name, { ...into.get(name), ...section });
};

export const parseIni = (text: string, source = '<string>'): IniData => {
	const { sectionNames, lines, quoted } = scanLines(text, source);
	const parsed: unknown = ini.parse(quoted);

	const collected = new Map<string, IniSection>();
	if (isRecord(parsed)) {
		collectSections(parsed, '', collected);
	}

	const sections = new Map<string, IniSection>();
	for (const name of sectionNames) {
		sections.set(name, collected.get(name) ?? {});
	}

	return {
		defaults: {
			...collected.get(''),
			...collected.get(DEFAULT_SECTION),
		},
		sections,
		lines,
	};
};

export const readIniFile = (filePath: string, label = 'file'): IniData => {
	if (!isFile(filePath)) {
		throw new FileNotFoundError(filePath, label);
	}

	let text: string;
	try {
		text = readFileSync(filePath, 'utf8');
	} catch (error) {
		throw new FileReadError(filePath, errorMessage(error));
	}

	return parseIni(text, filePath);
};

/**
 * Read-only view over a parsed ini file.
 *
 * Every lookup throws `MissingSectionError` or `MissingKeyError` when the
 * value is absent, unless the caller passed a fallback.
 */
export class IniFile {
	constructor(
		readonly path: string,
		protected readonly data: IniData
	) {}

	/** Section names in file order, without DEFAULT. */
	sections(): string[] {
		return [...this.data.sections.keys()];
	}

	hasSection(section: string): boolean {
		return this.lookupSection(section) !== undefined;
	}

	hasKey(section: string, key: string): boolean {
		return this.lookupValue(section, key) !== undefined;
	}

	/** Keys of a section, including those inherited from DEFAULT. */
	keys(section: string): string[] {
		return Object.keys(this.requireSection(section));
	}

	items(section: string): [key: string, value: string][] {
		return Object.entries(this.requireSection(section));
	}

	get(section: string, key: string, fallback?: string): string {
		const value = this.lookupValue(section, key);
		if (value !== undefined) {
			return value;
		}
		if (fallback !== undefined) {
			return fallback;
		}
		return this.missing(section, key);
	}

	getNumber(section: string, key: string, fallback?: number): number {
		const raw = this.lookupValue(section, key);
		if (raw === undefined) {
			return fallback ?? this.missing(section, key);
		}

		const value = Number(raw);
		if (raw.trim() === '' || Number.isNaN(value)) {
			throw new InvalidValueError(section, key, raw, 'a number');
		}
		return value;
	}

	getInteger(section: string, key: string, fallback?: number): number {
		const raw = this.lookupValue(section, key);
		if (raw === undefined) {
			return fallback ?? this.missing(section, key);
		}

		if (!/^[-+]?\d+$/.test(raw.trim())) {
			throw new InvalidValueError(section, key, raw, 'an integer');
		}
		return Number(raw);
	}

	getBoolean(section: string, key: string, fallback?: boolean): boolean {
		const raw = this.lookupValue(section, key);
		if (raw === undefined) {
			return fallback ?? this.missing(section, key);
		}

		const value = parseBooleanWord(raw);
		if (value === undefined) {
			throw new InvalidValueError(section, key, raw, 'a boolean');
		}
		return value;
	}

	getList(section: string, key: string, separator = ','): string[] {
		return this.get(section, key)
			.split(separator)
			.map((item) => item.trim())
			.filter(Boolean);
	}

	protected lookupSection(section: string): IniSection | undefined {
		if (section === DEFAULT_SECTION) {
			return this.data.defaults;
		}

		const values = this.data.sections.get(section);
		return values && { ...this.data.defaults, ...values };
	}

	private requireSection(section: string): IniSection {
		const values = this.lookupSection(section);
		if (!values) {
			throw new MissingSectionError(this.path, section);
		}
		return values;
	}

	private lookupValue(section: string, key: string): string | undefined {
		const values = this.lookupSection(section);
		return values && hasOwn(values, key) ? values[key] : undefined;
	}

	private missing(section: string, key: string): never {
		this.requireSection(section);
		throw new MissingKeyError(this.path, section, key);
	}
}
