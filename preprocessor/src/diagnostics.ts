import { DiagnosticSeverity, type Diagnostic, type PublishDiagnosticsParams, type Range } from 'vscode-languageserver/node';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import { URI } from 'vscode-uri';
import type { PreprocErrorKind, PreprocWarning, PreprocessorError } from './core/errors';
import type { Location } from './core/location';
import { type PreprocessOptions, checkSources } from './core/pipeline';

export const PREPROC_DIAGCODES = {
	SYNTAX: 'PP000',
	MACRO_NAME: 'PP010',
	ARITY: 'PP020',
	EVALUATION: 'PP030',
	INCLUDE_CYCLE: 'PP040',
	INCLUDE_NOT_FOUND: 'PP041',
	USER_ERROR: 'PP050',
	USER_WARNING: 'PP060',
} as const;
export type DiagCode = typeof PREPROC_DIAGCODES[keyof typeof PREPROC_DIAGCODES];

const CODE_BY_KIND: Record<PreprocErrorKind, DiagCode> = {
	syntax: PREPROC_DIAGCODES.SYNTAX,
	name: PREPROC_DIAGCODES.MACRO_NAME,
	arity: PREPROC_DIAGCODES.ARITY,
	eval: PREPROC_DIAGCODES.EVALUATION,
	cycle: PREPROC_DIAGCODES.INCLUDE_CYCLE,
	include: PREPROC_DIAGCODES.INCLUDE_NOT_FOUND,
	user: PREPROC_DIAGCODES.USER_ERROR,
};

export interface Diag {
	loc: Location;
	message: string;
	severity: 'error' | 'warning';
	code: DiagCode;
}

export function diagFromError(err: PreprocessorError): Diag {
	return { loc: err.loc, message: err.detail, severity: 'error', code: CODE_BY_KIND[err.kind] };
}

export function diagFromWarning(w: PreprocWarning): Diag {
	return { loc: w.loc, message: w.message, severity: 'warning', code: PREPROC_DIAGCODES.USER_WARNING };
}

// Positions in our locations are 1-based lines / 0-based columns; LSP wants both 0-based.
export function locationToRange(loc: Location): Range {
	return {
		start: { line: loc.start.line - 1, character: loc.start.column },
		end: { line: loc.end.line - 1, character: loc.end.column },
	};
}

export function toLspDiagnostic(d: Diag): Diagnostic {
	return {
		range: locationToRange(d.loc),
		message: d.message,
		severity: d.severity === 'error' ? DiagnosticSeverity.Error : DiagnosticSeverity.Warning,
		code: d.code,
		source: 'preproc',
	};
}

/** Groups diagnostics per file, in first-seen order, keyed by `file://` URI. */
export function toPublishDiagnostics(diags: readonly Diag[]): PublishDiagnosticsParams[] {
	const byUri = new Map<string, Diagnostic[]>();
	for (const d of diags) {
		const uri = URI.file(d.loc.start.file).toString();
		const list = byUri.get(uri) ?? [];
		list.push(toLspDiagnostic(d));
		byUri.set(uri, list);
	}
	return [...byUri].map(([uri, diagnostics]) => ({ uri, diagnostics }));
}

/**
 * Preprocesses an open document and returns what to publish. The document's own
 * entry is always present, empty when clean, so stale diagnostics get cleared.
 */
export function checkDocument(doc: TextDocument, opts: PreprocessOptions = {}): PublishDiagnosticsParams[] {
	const file = URI.parse(doc.uri).fsPath;
	const { errors, warnings } = checkSources([{ file, text: doc.getText() }], opts);
	const published = toPublishDiagnostics([...warnings.map(diagFromWarning), ...errors.map(diagFromError)]);
	const uri = URI.file(file).toString();
	return published.some(p => p.uri === uri) ? published : [{ uri, diagnostics: [] }, ...published];
}
