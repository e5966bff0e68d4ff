export type { ArithExpr, BoolExpr, Node, NodeKind } from './ast';
export { parseMacroBody, parseSource } from './ast/parser';
export { MacroEnv, type MacroDef } from './core/env';
export {
	ArityError,
	EvaluationError,
	IncludeCycleError,
	IncludeError,
	MacroNameError,
	ParseError,
	PreprocessorError,
	UserDirectiveError,
	formatWarning,
	type PreprocErrorKind,
	type PreprocWarning,
} from './core/errors';
export { evalArith, evalBool } from './core/eval';
export { Expander, MarkerState, OutputBuffer, type ExpanderOptions } from './core/expander';
export { IncludeResolver, nodeHost, type ResolvedFile, type SourceHost } from './core/include';
export { formatLocation, type Location, type Position } from './core/location';
export {
	COMMAND_LINE_FILE,
	checkSources,
	envFromDefines,
	preprocessSources,
	preprocessText,
	type CheckResult,
	type MacroDefines,
	type PreprocessOptions,
	type PreprocessResult,
	type SourceInput,
	type WarningMode,
} from './core/pipeline';
export { findConfigFile, loadConfig, optionsFromConfig, parseConfig, type PreprocConfig } from './config';
export {
	PREPROC_DIAGCODES,
	checkDocument,
	diagFromError,
	diagFromWarning,
	toLspDiagnostic,
	toPublishDiagnostics,
	type Diag,
	type DiagCode,
} from './diagnostics';
