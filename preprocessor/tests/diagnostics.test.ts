import { describe, it, expect } from 'vitest';
import { DiagnosticSeverity } from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';
import {
	ArityError,
	EvaluationError,
	IncludeCycleError,
	IncludeError,
	MacroNameError,
	ParseError,
	UserDirectiveError,
} from '../src/core/errors';
import { syntheticLocation } from '../src/core/location';
import { checkSources } from '../src/core/pipeline';
import { checkDocument, diagFromError, diagFromWarning, toLspDiagnostic, toPublishDiagnostics } from '../src/diagnostics';
import { memHost } from './testUtils';

describe('diagnostic codes', () => {
	it('maps every error class to its code', () => {
		const loc = syntheticLocation('x');
		const codes = [
			new ParseError(loc, 'e'),
			new MacroNameError(loc, 'e'),
			new ArityError(loc, 'e', 1, 0),
			new EvaluationError(loc, 'e'),
			new IncludeCycleError(loc, 'f'),
			new IncludeError(loc, 'f'),
			new UserDirectiveError(loc, 'e'),
		].map(e => diagFromError(e).code);
		expect(codes).toEqual(['PP000', 'PP010', 'PP020', 'PP030', 'PP040', 'PP041', 'PP050']);
	});
});

describe('LSP conversion', () => {
	const host = memHost({
		'/w/m.c': '#warning "check"\n#include "nope.h"\n',
		'/w/other.c': '#warning "also"\n',
	});

	it('converts errors with zero-based ranges', () => {
		const { errors } = checkSources([{ file: '/w/m.c' }], { host });
		const err = errors[0];
		if (!err) throw new Error('expected an error');
		expect(toLspDiagnostic(diagFromError(err))).toEqual({
			range: { start: { line: 1, character: 0 }, end: { line: 1, character: 17 } },
			message: 'Cannot find included file "nope.h"',
			severity: DiagnosticSeverity.Error,
			code: 'PP041',
			source: 'preproc',
		});
	});

	it('groups diagnostics by file URI', () => {
		const main = checkSources([{ file: '/w/m.c' }], { host });
		const other = checkSources([{ file: '/w/other.c' }], { host });
		const diags = [
			...main.warnings.map(diagFromWarning),
			...main.errors.map(diagFromError),
			...other.warnings.map(diagFromWarning),
		];
		const published = toPublishDiagnostics(diags);
		expect(published.map(p => p.uri)).toEqual(['file:///w/m.c', 'file:///w/other.c']);
		expect(published[0]?.diagnostics.map(d => [d.severity, d.code])).toEqual([
			[DiagnosticSeverity.Warning, 'PP060'],
			[DiagnosticSeverity.Error, 'PP041'],
		]);
		expect(published[1]?.diagnostics.map(d => d.message)).toEqual(['also']);
	});
});

describe('checkDocument', () => {
	const host = memHost({ '/w/lib.h': '#warning "from lib"\n' });

	it('publishes an empty list for a clean document', () => {
		const doc = TextDocument.create('file:///w/doc.c', 'c', 1, 'plain\n');
		expect(checkDocument(doc, { host })).toEqual([{ uri: 'file:///w/doc.c', diagnostics: [] }]);
	});

	it('reads the unsaved text and reports included files separately', () => {
		const doc = TextDocument.create('file:///w/doc.c', 'c', 2, '#include "lib.h"\n#error "unsaved"\n');
		const published = checkDocument(doc, { host });
		expect(published.map(p => [p.uri, p.diagnostics.map(d => d.message)])).toEqual([
			['file:///w/lib.h', ['from lib']],
			['file:///w/doc.c', ['unsaved']],
		]);
	});
});
