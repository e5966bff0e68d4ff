import { type Location, formatLocation, quoteString } from './location';

export type PreprocErrorKind = 'syntax' | 'name' | 'arity' | 'eval' | 'cycle' | 'include' | 'user';

export function formatDiagnostic(loc: Location, severity: 'Error' | 'Warning', detail: string): string {
	return `${formatLocation(loc)}\n${severity}: ${detail}`;
}

/**
 * Base class of every fatal preprocessing failure. `message` carries the full
 * located diagnostic, `detail` only the text after `Error: `.
 */
export class PreprocessorError extends Error {
	constructor(
		readonly kind: PreprocErrorKind,
		readonly loc: Location,
		readonly detail: string,
		options?: { cause?: unknown },
	) {
		super(formatDiagnostic(loc, 'Error', detail), options);
		this.name = new.target.name;
	}
}

export class ParseError extends PreprocessorError {
	constructor(loc: Location, detail: string) { super('syntax', loc, detail); }
}

export class MacroNameError extends PreprocessorError {
	constructor(loc: Location, detail: string) { super('name', loc, detail); }
}

export class ArityError extends PreprocessorError {
	constructor(loc: Location, detail: string, readonly expected: number, readonly actual: number | null) {
		super('arity', loc, detail);
	}
}

export class EvaluationError extends PreprocessorError {
	constructor(loc: Location, detail: string, options?: { cause?: unknown }) { super('eval', loc, detail, options); }
}

export class IncludeCycleError extends PreprocessorError {
	constructor(loc: Location, readonly file: string) {
		super('cycle', loc, `Cyclic inclusion of file ${quoteString(file)}`);
	}
}

export class IncludeError extends PreprocessorError {
	constructor(loc: Location, readonly target: string) {
		super('include', loc, `Cannot find included file ${quoteString(target)}`);
	}
}

// Raised by `#error`; also by `#warning` when warnings are configured as errors.
export class UserDirectiveError extends PreprocessorError {
	constructor(loc: Location, detail: string) { super('user', loc, detail); }
}

export interface PreprocWarning {
	loc: Location;
	message: string;
}

export function formatWarning(w: PreprocWarning): string {
	return formatDiagnostic(w.loc, 'Warning', w.message);
}
