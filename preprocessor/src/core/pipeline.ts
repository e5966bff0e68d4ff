import type { Node } from '../ast';
import { parseMacroBody, parseSource } from '../ast/parser';
import { MacroEnv } from './env';
import { EvaluationError, MacroNameError, type PreprocWarning, PreprocessorError, UserDirectiveError, formatWarning } from './errors';
import { Expander, MarkerState, OutputBuffer } from './expander';
import { IncludeResolver, type ParseFn, type SourceHost, nodeHost, sourceId } from './include';
import { quoteString, syntheticLocation } from './location';

export type MacroDefines = Record<string, string | number | boolean>;

export type WarningMode = 'show' | 'ignore' | 'error';

export interface PreprocessOptions {
	// starting environment; `defines` are bound on top of it
	env?: MacroEnv;
	defines?: MacroDefines;
	includePaths?: readonly string[];
	host?: SourceHost;
	parse?: ParseFn;
	lineDirectives?: boolean;
	warnings?: WarningMode;
	// receives warnings in 'show' mode instead of stderr
	onWarning?: (w: PreprocWarning) => void;
}

export interface SourceInput {
	file: string;
	// read through the host when absent
	text?: string;
}

export interface PreprocessResult {
	output: string;
	env: MacroEnv;
}

export const COMMAND_LINE_FILE = '<command line>';

/**
 * Binds each predefined macro in order, as if by `#define NAME value`.
 * `true` defines the macro as 1, `false` leaves it undefined. Numbers must be
 * safe integers; wider 64-bit values are passed as strings.
 */
export function envFromDefines(defines: MacroDefines, base: MacroEnv = MacroEnv.empty): MacroEnv {
	let env = base;
	for (const [name, value] of Object.entries(defines)) {
		if (value === false) continue;
		const loc = syntheticLocation(COMMAND_LINE_FILE);
		if (env.has(name)) throw new MacroNameError(loc, `${quoteString(name)} is already defined`);
		if (typeof value === 'number' && !Number.isSafeInteger(value)) {
			throw new EvaluationError(loc, `Value of ${quoteString(name)} is not a safe integer; give it as a string`);
		}
		const body = parseMacroBody(COMMAND_LINE_FILE, value === true ? '1' : String(value));
		env = env.bind({ kind: 'object', loc, name, body, env });
	}
	return env;
}

function warningSink(opts: PreprocessOptions): (w: PreprocWarning) => void {
	switch (opts.warnings ?? 'show') {
		case 'ignore': return () => { /* dropped by configuration */ };
		case 'error': return w => { throw new UserDirectiveError(w.loc, w.message); };
		case 'show': return opts.onWarning ?? (w => console.error(formatWarning(w)));
	}
}

/**
 * Expands several sources into one output under one environment threaded from
 * source to source. Each source starts with a fresh marker state and an
 * inclusion ancestry holding only itself.
 */
export function preprocessSources(sources: readonly SourceInput[], opts: PreprocessOptions = {}): PreprocessResult {
	const host = opts.host ?? nodeHost;
	const parse = opts.parse ?? parseSource;
	const includes = new IncludeResolver({ host, includePaths: opts.includePaths ?? [], parse });
	const expanderOpts = { includes, onWarning: warningSink(opts), lineDirectives: opts.lineDirectives ?? true };
	const output = new OutputBuffer();
	let env = envFromDefines(opts.defines ?? {}, opts.env);
	for (const src of sources) {
		const nodes: Node[] = parse(src.file, src.text ?? host.readFile(src.file));
		const expander = new Expander(output, new MarkerState(), expanderOpts, [sourceId(src.file)]);
		env = expander.expand(env, nodes);
	}
	return { output: output.toString(), env };
}

export function preprocessText(text: string, opts: PreprocessOptions & { file?: string } = {}): PreprocessResult {
	return preprocessSources([{ file: opts.file ?? '<stdin>', text }], opts);
}

export interface CheckResult {
	output: string | null;
	env: MacroEnv | null;
	errors: PreprocessorError[];
	warnings: PreprocWarning[];
}

/**
 * Runs `preprocessSources` collecting diagnostics instead of throwing or
 * printing, for editor integrations. Failures other than preprocessing errors
 * propagate.
 */
export function checkSources(sources: readonly SourceInput[], opts: PreprocessOptions = {}): CheckResult {
	const warnings: PreprocWarning[] = [];
	const collect = { ...opts, onWarning: (w: PreprocWarning) => { warnings.push(w); } };
	try {
		const { output, env } = preprocessSources(sources, collect);
		return { output, env, errors: [], warnings };
	} catch (err) {
		if (err instanceof PreprocessorError) return { output: null, env: null, errors: [err], warnings };
		throw err;
	}
}
