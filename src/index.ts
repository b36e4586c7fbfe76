export {
	KnownError,
	FileNotFoundError,
	FileReadError,
	IniParseError,
	MissingSectionError,
	MissingKeyError,
	InvalidValueError,
	CopyVerificationError,
	OptionsError,
	handleCliError,
	handleCommandError,
} from './utils/error.js';
export {
	DEFAULT_SECTION,
	IniFile,
	parseIni,
	parseBooleanWord,
	readIniFile,
	type IniData,
	type IniSection,
} from './utils/ini.js';
export {
	Config,
	loadConfig,
	resolveConfigPath,
	type ConfigOptions,
} from './utils/config.js';
export {
	getConfigDir,
	getConfigFilePath,
	resolveFilePath,
	type FileLocation,
} from './utils/paths.js';
export {
	DEFAULT_LANGUAGE,
	Resources,
	formatString,
	interpolate,
	loadResources,
	resourcesFileName,
	type CodedMessage,
	type InterpolationValues,
	type ResourcesLocation,
} from './utils/resources.js';
export {
	OptionsErrorCode,
	buildParserSchema,
	isPositional,
	parseOptions,
	readOptionDefinition,
	type OptionAction,
	type OptionDefinition,
	type OptionValue,
	type OptionValueType,
	type ParsedOptions,
	type ParseSettings,
	type ParserSchema,
} from './utils/options.js';
export * from './utils/fs.js';
export * from './utils/framespec.js';
export * from './utils/general.js';
