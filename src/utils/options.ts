import path from 'path';
import { fileURLToPath } from 'url';
import { cli } from 'cleye';
import { lightYellow } from 'kolorist';
import { OptionsError } from './error.js';
import { isFile } from './fs.js';
import { kebabToCamel } from './general.js';
import { parseBooleanWord } from './ini.js';
import {
	DEFAULT_LANGUAGE,
	Resources,
	formatString,
	resourcesFileName,
	type InterpolationValues,
} from './resources.js';

// Same relative location from src/utils and dist/utils.
const bundledResourcesDir = fileURLToPath(new URL('../../resources', import.meta.url));

export const OptionsErrorCode = {
	missingSection: 106,
	missingSetting: 107,
	invalidSetting: 108,
	variadicNotLast: 109,
	unknownFlag: 110,
	missingRequired: 111,
	invalidValue: 112,
} as const;

const actions = ['store', 'store_true', 'store_false', 'append', 'count'] as const;
export type OptionAction = (typeof actions)[number];

const valueTypes = ['str', 'int', 'float', 'bool', 'list'] as const;
export type OptionValueType = (typeof valueTypes)[number];

export type Nargs = '?' | '*' | '+' | number;

/** One `[options-<name>]` section of a resource file. */
export type OptionDefinition = {
	name: string;
	shortFlag?: string;
	longFlag?: string;
	action: OptionAction;
	dest?: string;
	type: OptionValueType;
	default?: string;
	metavar?: string;
	nargs?: Nargs;
	required: boolean;
	description?: string;
};

export type ScalarValue = string | number | boolean | string[];
export type OptionValue = ScalarValue | ScalarValue[] | undefined;

export type ParsedOptions = {
	/** Keyed by `dest`, or the camel-cased long flag, short flag or positional name. */
	values: Record<string, OptionValue>;
	positionals: string[];
	unknown: string[];

	/** Arguments after `--`. */
	rest: string[];
};

export type ParseSettings = {
	/** Program name shown in help. */
	name?: string;

	/** Keep unrecognized flags in `unknown` instead of failing. */
	allowUnknown?: boolean;

	/** Language of the error messages. Defaults to the resources' language. */
	language?: string;
};

type FlagType = (value: string) => unknown;

export type FlagDefinition = {
	type: FlagType | [FlagType];
	alias?: string;
	default?: unknown;
	description?: string;
	placeholder?: string;
};

type Binding = {
	definition: OptionDefinition;
	resultKey: string;
	label: string;
	source: { kind: 'flag'; flag: string } | { kind: 'parameter'; name: string };
	convert: (value: string) => ScalarValue;

	/** Value when the option is not given on the command line. */
	defaultValue: OptionValue;
};

export type ParserSchema = {
	flags: Record<string, FlagDefinition>;
	parameters: string[];
	help: {
		description?: string;
		usage?: string;
	};
	bindings: Binding[];
};

const optionsResourcesCache = new Map<string, Resources>();

const getOptionsResources = (language: string) => {
	const available = isFile(
		path.join(bundledResourcesDir, resourcesFileName('options', language))
	)
		? language
		: DEFAULT_LANGUAGE;

	let resources = optionsResourcesCache.get(available);
	if (!resources) {
		resources = new Resources(bundledResourcesDir, 'options', available);
		optionsResourcesCache.set(available, resources);
	}
	return resources;
};

const optionsError = (
	language: string,
	code: number,
	values: InterpolationValues
) => {
	const { message } = getOptionsResources(language).error(code, values);
	return new OptionsError(code, message);
};

const shortFlagPattern = /^-[a-zA-Z0-9]$/;
const integerPattern = /^[-+]?\d+$/;

// cleye registers --help with the -h alias on every parser.
const helpFlags = new Set(['-h', '--help']);
const longFlagPattern = /^--[a-zA-Z0-9][\w-]*$/;
const positionalPattern = /^[a-z][a-zA-Z0-9]*$/;

export const isPositional = (definition: OptionDefinition) =>
	![definition.shortFlag, definition.longFlag].some((flag) => flag?.startsWith('-'));

const isVariadic = (definition: OptionDefinition) =>
	definition.nargs === '*' ||
	definition.nargs === '+' ||
	typeof definition.nargs === 'number';

const isOneOf = <T extends string>(values: readonly T[], value: string): value is T =>
	values.some((item) => item === value);

const parseNargs = (value: string): Nargs | undefined => {
	if (value === '?' || value === '*' || value === '+') {
		return value;
	}
	if (/^\d+$/.test(value) && Number(value) >= 2) {
		return Number(value);
	}
	return undefined;
};

/**
 * Reads the definition of option `name` from the `[options-<name>]` section.
 *
 * Only one of `short_flag` and `long_flag` is required. Flags that do not
 * start with a dash make the option positional.
 */
export const readOptionDefinition = (
	resources: Resources,
	name: string,
	language = resources.language
): OptionDefinition => {
	const section = `options-${name}`;
	const context = { path: resources.path, section };

	if (!resources.hasSection(section)) {
		throw optionsError(language, OptionsErrorCode.missingSection, context);
	}

	const setting = (key: string) => resources.get(section, key, '').trim() || undefined;
	const invalid = (key: string, value: string) =>
		optionsError(language, OptionsErrorCode.invalidSetting, {
			...context,
			setting: key,
			value,
		});

	const shortFlag = setting('short_flag');
	const longFlag = setting('long_flag');
	if (!shortFlag && !longFlag) {
		throw optionsError(language, OptionsErrorCode.missingSetting, {
			...context,
			setting: 'long_flag',
		});
	}

	const action = setting('action') ?? 'store';
	if (!isOneOf(actions, action)) {
		throw invalid('action', action);
	}

	const type = setting('type') ?? 'str';
	if (!isOneOf(valueTypes, type)) {
		throw invalid('type', type);
	}

	const rawNargs = setting('nargs');
	const nargs = rawNargs === undefined ? undefined : parseNargs(rawNargs);
	if (rawNargs !== undefined && nargs === undefined) {
		throw invalid('nargs', rawNargs);
	}

	const definition: OptionDefinition = {
		name,
		shortFlag,
		longFlag,
		action,
		dest: setting('dest'),
		type,
		default: setting('default'),
		metavar: setting('metavar'),
		nargs,
		required: false,
		description: setting('description'),
	};

	const positional = isPositional(definition);
	if (positional) {
		const label = longFlag ?? shortFlag ?? name;
		if (!positionalPattern.test(label)) {
			throw invalid(longFlag ? 'long_flag' : 'short_flag', label);
		}
		if (action !== 'store') {
			throw invalid('action', action);
		}
	} else {
		if (shortFlag && !shortFlagPattern.test(shortFlag)) {
			throw invalid('short_flag', shortFlag);
		}
		if (longFlag && !longFlagPattern.test(longFlag)) {
			throw invalid('long_flag', longFlag);
		}
		if (shortFlag && helpFlags.has(shortFlag)) {
			throw invalid('short_flag', shortFlag);
		}
		if (longFlag && helpFlags.has(longFlag)) {
			throw invalid('long_flag', longFlag);
		}
	}

	const rawRequired = setting('required');
	if (rawRequired === undefined) {
		definition.required = positional && definition.nargs !== '?' && definition.nargs !== '*';
	} else {
		const required = parseBooleanWord(rawRequired);
		if (required === undefined) {
			throw invalid('required', rawRequired);
		}
		definition.required = required;
	}

	if (definition.default !== undefined && !isValidDefault(definition, language)) {
		throw invalid('default', definition.default);
	}

	return definition;
};

// `append` starts from an empty list, so it takes no default.
const isValidDefault = (definition: OptionDefinition, language: string) => {
	const value = definition.default ?? '';

	switch (definition.action) {
		case 'store_true':
		case 'store_false': {
			return parseBooleanWord(value) !== undefined;
		}
		case 'count': {
			return integerPattern.test(value);
		}
		case 'append': {
			return false;
		}
		default: {
			try {
				createConverter(definition, definition.name, language)(value);
				return true;
			} catch (error) {
				if (error instanceof OptionsError) {
					return false;
				}
				throw error;
			}
		}
	}
};

const createConverter = (
	definition: OptionDefinition,
	label: string,
	language: string
) => {
	const invalid = (value: string, expected: string) =>
		optionsError(language, OptionsErrorCode.invalidValue, {
			option: label,
			expected,
			value,
		});

	return (value: string): ScalarValue => {
		switch (definition.type) {
			case 'int': {
				if (!integerPattern.test(value.trim())) {
					throw invalid(value, 'an integer');
				}
				return Number(value);
			}
			case 'float': {
				const parsed = Number(value);
				if (value.trim() === '' || Number.isNaN(parsed)) {
					throw invalid(value, 'a number');
				}
				return parsed;
			}
			case 'bool': {
				const parsed = parseBooleanWord(value);
				if (parsed === undefined) {
					throw invalid(value, 'true or false');
				}
				return parsed;
			}
			case 'list': {
				return value
					.split(',')
					.map((item) => item.trim())
					.filter(Boolean);
			}
			default: {
				return value;
			}
		}
	};
};

const flagSchema = (
	definition: OptionDefinition,
	convert: (value: string) => ScalarValue,
	alias: string | undefined
): FlagDefinition => {
	const description = definition.description
		? lightYellow(formatString(definition.description))
		: undefined;
	const common = {
		alias,
		description,
		placeholder: definition.metavar,
	};

	switch (definition.action) {
		case 'store_true': {
			return { ...common, type: Boolean };
		}
		case 'store_false': {
			return { ...common, type: Boolean };
		}
		case 'count': {
			return { ...common, type: [Boolean] };
		}
		case 'append': {
			return { ...common, type: [convert] };
		}
		default: {
			if (isVariadic(definition)) {
				return { ...common, type: [convert] };
			}
			return {
				...common,
				type: convert,
				default:
					definition.default === undefined
						? undefined
						: convert(definition.default),
			};
		}
	}
};

const defaultValue = (
	definition: OptionDefinition,
	convert: (value: string) => ScalarValue
): OptionValue => {
	const { action, default: raw } = definition;

	switch (action) {
		case 'store_true': {
			return raw === undefined ? false : parseBooleanWord(raw) === true;
		}
		case 'store_false': {
			return raw === undefined ? true : parseBooleanWord(raw) !== false;
		}
		case 'count': {
			return raw === undefined ? 0 : Number(raw);
		}
		case 'append': {
			return [];
		}
		default: {
			if (isVariadic(definition)) {
				return raw === undefined ? [] : [convert(raw)];
			}
			return raw === undefined ? undefined : convert(raw);
		}
	}
};

// type-flag takes flag names of two or more characters, so an option with
// only a short flag is registered under its dest or option name and reached
// through the letter alias.
const shortOnlyFlagName = (definition: OptionDefinition) => {
	const name = kebabToCamel(definition.dest ?? definition.name);
	return name.length > 1 ? name : `${name}Option`;
};

/**
 * Turns option definitions into the flags and parameters cleye parses with.
 *
 * Flags that take several values (`append`, or `nargs` on a flag) are given
 * once per value; an integer `nargs` must then be met exactly. Positionals
 * are all declared optional; required ones are checked after parsing so a
 * missing one raises `OptionsError`. Two options sharing a flag name or
 * letter raise `OptionsError` 108.
 */
export const buildParserSchema = (
	definitions: readonly OptionDefinition[],
	resources?: Resources,
	language = resources?.language ?? DEFAULT_LANGUAGE
): ParserSchema => {
	const flags: Record<string, FlagDefinition> = {};
	const parameters: string[] = [];
	const bindings: Binding[] = [];
	const usedNames = new Set(['help']);
	const usedAliases = new Set(['h']);

	const conflict = (definition: OptionDefinition, setting: string, value: string) =>
		optionsError(language, OptionsErrorCode.invalidSetting, {
			path: resources?.path ?? '<options>',
			section: `options-${definition.name}`,
			setting,
			value,
		});

	const positionals = definitions.filter(isPositional);
	positionals.forEach((definition, index) => {
		const name = definition.longFlag ?? definition.shortFlag ?? definition.name;
		if (isVariadic(definition) && index !== positionals.length - 1) {
			throw optionsError(language, OptionsErrorCode.variadicNotLast, {
				option: name,
			});
		}
	});

	for (const definition of definitions) {
		if (isPositional(definition)) {
			const name = definition.longFlag ?? definition.shortFlag ?? definition.name;
			const convert = createConverter(definition, name, language);
			parameters.push(isVariadic(definition) ? `[${name}...]` : `[${name}]`);
			bindings.push({
				definition,
				resultKey: definition.dest ?? name,
				label: name,
				source: { kind: 'parameter', name },
				convert,
				defaultValue: defaultValue(definition, convert),
			});
			continue;
		}

		const { shortFlag, longFlag } = definition;
		const flag = longFlag ? kebabToCamel(longFlag.slice(2)) : shortOnlyFlagName(definition);
		const alias = shortFlag?.slice(1);
		const label = longFlag ?? shortFlag ?? definition.name;
		const convert = createConverter(definition, label, language);

		if (usedNames.has(flag)) {
			throw conflict(definition, longFlag ? 'long_flag' : 'short_flag', label);
		}
		if (alias !== undefined && usedAliases.has(alias)) {
			throw conflict(definition, 'short_flag', `-${alias}`);
		}
		usedNames.add(flag);
		if (alias !== undefined) {
			usedAliases.add(alias);
		}

		flags[flag] = flagSchema(definition, convert, alias);
		bindings.push({
			definition,
			resultKey: definition.dest ?? (longFlag ? flag : alias ?? flag),
			label,
			source: { kind: 'flag', flag },
			convert,
			defaultValue: defaultValue(definition, convert),
		});
	}

	return {
		flags,
		parameters,
		help: {
			description: resources?.description(),
			usage: resources?.usage(),
		},
		bindings,
	};
};

const isScalar = (value: unknown): value is ScalarValue =>
	typeof value === 'string' ||
	typeof value === 'number' ||
	typeof value === 'boolean' ||
	(Array.isArray(value) && value.every((item) => typeof item === 'string'));

const isString = (value: unknown): value is string => typeof value === 'string';

const resolveValue = (
	binding: Binding,
	flagValues: object,
	parameterValues: unknown
): OptionValue => {
	const { definition, source, defaultValue: fallback } = binding;

	if (source.kind === 'parameter') {
		const raw: unknown =
			typeof parameterValues === 'object' && parameterValues !== null
				? Reflect.get(parameterValues, source.name)
				: undefined;

		if (Array.isArray(raw)) {
			const values = raw.filter(isString).map(binding.convert);
			return values.length > 0 ? values : fallback;
		}
		return typeof raw === 'string' ? binding.convert(raw) : fallback;
	}

	const raw: unknown = Reflect.get(flagValues, source.flag);

	switch (definition.action) {
		case 'store_true': {
			return raw === true ? true : fallback;
		}
		case 'store_false': {
			return raw === true ? false : fallback;
		}
		case 'count': {
			const start = typeof fallback === 'number' ? fallback : 0;
			return start + (Array.isArray(raw) ? raw.length : 0);
		}
		default: {
			if (Array.isArray(raw)) {
				const values = raw.filter(isScalar);
				return values.length > 0 ? values : fallback;
			}
			return isScalar(raw) ? raw : fallback;
		}
	}
};

const isMissing = (value: OptionValue) =>
	value === undefined || (Array.isArray(value) && value.length === 0);

const flagLabel = (flag: string) => (flag.length === 1 ? `-${flag}` : `--${flag}`);

/**
 * Builds a parser from the `[options-<name>]` sections named in
 * `optionNames` and parses `argv` (without the node and script entries).
 */
export const parseOptions = (
	optionNames: readonly string[],
	resources: Resources,
	argv: readonly string[],
	settings: ParseSettings = {}
): ParsedOptions => {
	const language = settings.language ?? resources.language;
	const definitions = optionNames.map((name) =>
		readOptionDefinition(resources, name, language)
	);
	const schema = buildParserSchema(definitions, resources, language);

	const parsed = cli(
		{
			...(settings.name ? { name: settings.name } : {}),
			parameters: schema.parameters,
			flags: schema.flags,
			help: schema.help,
		},
		undefined,
		[...argv]
	);

	const unknown = Object.keys(parsed.unknownFlags).map(flagLabel);
	if (unknown.length > 0 && !settings.allowUnknown) {
		throw optionsError(language, OptionsErrorCode.unknownFlag, {
			flags: unknown.join(', '),
		});
	}

	const parameterValues: unknown = Reflect.get(parsed, '_');
	const values: Record<string, OptionValue> = {};

	for (const binding of schema.bindings) {
		const value = resolveValue(binding, parsed.flags, parameterValues);
		const { nargs, required } = binding.definition;

		if (required && isMissing(value)) {
			throw optionsError(language, OptionsErrorCode.missingRequired, {
				option: binding.label,
			});
		}

		if (
			typeof nargs === 'number' &&
			Array.isArray(value) &&
			value.length > 0 &&
			value.length !== nargs
		) {
			throw optionsError(language, OptionsErrorCode.invalidValue, {
				option: binding.label,
				expected: `${nargs} values`,
				value: value.join(' '),
			});
		}

		values[binding.resultKey] = value;
	}

	const separated: unknown =
		typeof parameterValues === 'object' && parameterValues !== null
			? Reflect.get(parameterValues, '--')
			: undefined;
	const rest = Array.isArray(separated) ? separated.filter(isString) : [];

	// cleye appends the arguments after `--` to `_` as well
	const all = Array.isArray(parameterValues) ? parameterValues.filter(isString) : [];

	return {
		values,
		positionals: all.slice(0, all.length - rest.length),
		unknown,
		rest,
	};
};
