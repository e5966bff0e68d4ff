import { describe, it, expect } from 'vitest';
import {
	ARITH_KINDS,
	BOOL_KINDS,
	NODE_KINDS,
	type ArithExpr,
	type ArithKind,
	type BoolExpr,
	type BoolKind,
	type Node,
	type NodeKind,
} from '../src/ast';
import { MacroEnv } from '../src/core/env';
import { evalArith, evalBool } from '../src/core/eval';
import { syntheticLocation } from '../src/core/location';
import { preprocessSources } from '../src/core/pipeline';
import { memHost } from './testUtils';

const loc = syntheticLocation('/k/main.txt');
const one: ArithExpr = { kind: 'Int', value: 1n };

// One sample per tag; the Record type keeps the samples in step with the unions.
const arithSamples: Record<ArithKind, ArithExpr> = {
	Int: one,
	Ident: { kind: 'Ident', loc, name: 'ONE' },
	Neg: { kind: 'Neg', arg: one },
	Lnot: { kind: 'Lnot', arg: one },
	Add: { kind: 'Add', left: one, right: one },
	Sub: { kind: 'Sub', left: one, right: one },
	Mul: { kind: 'Mul', left: one, right: one },
	Lsl: { kind: 'Lsl', left: one, right: one },
	Lsr: { kind: 'Lsr', left: one, right: one },
	Asr: { kind: 'Asr', left: one, right: one },
	Land: { kind: 'Land', left: one, right: one },
	Lor: { kind: 'Lor', left: one, right: one },
	Lxor: { kind: 'Lxor', left: one, right: one },
	Div: { kind: 'Div', loc, left: one, right: one },
	Mod: { kind: 'Mod', loc, left: one, right: one },
};

const boolSamples: Record<BoolKind, BoolExpr> = {
	True: { kind: 'True' },
	False: { kind: 'False' },
	Defined: { kind: 'Defined', name: 'ONE' },
	Not: { kind: 'Not', arg: { kind: 'True' } },
	And: { kind: 'And', left: { kind: 'True' }, right: { kind: 'True' } },
	Or: { kind: 'Or', left: { kind: 'False' }, right: { kind: 'True' } },
	Eq: { kind: 'Eq', left: one, right: one },
	Lt: { kind: 'Lt', left: one, right: one },
	Gt: { kind: 'Gt', left: one, right: one },
};

const nodeSamples: Record<NodeKind, Node> = {
	Ident: { kind: 'Ident', loc, name: 'ONE' },
	Def: { kind: 'Def', loc, name: 'TWO', body: [] },
	Defun: { kind: 'Defun', loc, name: 'F', params: ['x'], body: [] },
	Undef: { kind: 'Undef', loc, name: 'TWO' },
	Include: { kind: 'Include', loc, path: 'inc.txt' },
	Cond: { kind: 'Cond', loc, test: { kind: 'True' }, ifTrue: [], ifFalse: [] },
	Error: { kind: 'Error', loc, message: 'stop' },
	Warning: { kind: 'Warning', loc, message: 'note' },
	Text: { kind: 'Text', loc, isSpace: false, text: 't' },
	Seq: { kind: 'Seq', nodes: [] },
	Line: { kind: 'Line', line: 9 },
	CurrentLine: { kind: 'CurrentLine', loc },
	CurrentFile: { kind: 'CurrentFile', loc },
};

describe('tree kinds', () => {
	it('lists every tag exactly once', () => {
		expect([...ARITH_KINDS].sort()).toEqual(Object.keys(arithSamples).sort());
		expect([...BOOL_KINDS].sort()).toEqual(Object.keys(boolSamples).sort());
		expect([...NODE_KINDS].sort()).toEqual(Object.keys(nodeSamples).sort());
	});

	it('evaluates every expression kind', () => {
		const env = MacroEnv.empty.bind({ kind: 'object', loc, name: 'ONE', body: [{ kind: 'Text', loc, isSpace: false, text: '1' }], env: MacroEnv.empty });
		for (const kind of ARITH_KINDS) expect(typeof evalArith(env, arithSamples[kind])).toBe('bigint');
		for (const kind of BOOL_KINDS) expect(typeof evalBool(env, boolSamples[kind])).toBe('boolean');
	});

	it('expands every node kind', () => {
		const host = memHost({ '/k/inc.txt': '' });
		const main = NODE_KINDS.filter(k => k !== 'Error').map(k => nodeSamples[k]);
		const parse = (file: string): Node[] => file === '/k/main.txt' ? main : [];
		const { output, env } = preprocessSources([{ file: '/k/main.txt', text: '' }], {
			host,
			parse,
			defines: { ONE: 1 },
			lineDirectives: false,
			warnings: 'ignore',
		});
		expect(output).toBe('1t\n# 9\n 1  "/k/main.txt" ');
		expect(env.names().sort()).toEqual(['F', 'ONE']);
	});
});
