/*
	Directive parser: turns source text into the Node tree consumed by the expander.
	Directive lines are `#name operands`; everything else is text, split into
	whitespace runs, words and punctuation so unexpanded text round-trips verbatim.
	`name(` with no space before the parenthesis is a macro call.
*/
import type { ArithExpr, BoolExpr, Node } from './index';
import { isSpaceText, text } from './index';
import { ParseError } from '../core/errors';
import { parseInt64 } from '../core/int64';
import { type Location, type Position, quoteString, spanLocations } from '../core/location';
import { Tokenizer, unquote } from '../core/tokenizer';
import { type Token, TokenStream } from '../core/tokens';

const BUILTINS = new Set(['__LINE__', '__FILE__']);

type Stop =
	| { kind: 'elif'; loc: Location; test: BoolExpr }
	| { kind: 'else' | 'endif'; loc: Location };

type DirectiveResult = { kind: 'node'; node: Node } | { kind: 'stop'; stop: Stop };

const describe = (t: Token) => t.kind === 'eol' || t.kind === 'eof' ? 'end of line' : `'${t.value}'`;
const isPunct = (t: Token, value: string) => t.kind === 'punct' && t.value === value;

export function parseSource(file: string, source: string): Node[] {
	return new Parser(new Tokenizer(source, file)).parseFile();
}

/** Parses a single-line macro body, as written after `#define NAME `. */
export function parseMacroBody(file: string, source: string): Node[] {
	return new Parser(new Tokenizer(source, file)).parseStandaloneBody();
}

class Parser {
	constructor(private readonly tz: Tokenizer) { }

	parseFile(): Node[] {
		const { nodes, stop } = this.parseItems();
		if (stop) throw new ParseError(stop.loc, `#${stop.kind} without #if`);
		return nodes;
	}

	parseStandaloneBody(): Node[] {
		const { body } = this.parseBody();
		const rest = this.tz.next('args');
		if (rest.kind !== 'eof') throw new ParseError(rest.loc, 'macro body must fit on one line');
		return body;
	}

	// Items up to the end of input or the next #elif/#else/#endif.
	private parseItems(): { nodes: Node[]; stop: Stop | null } {
		const nodes: Node[] = [];
		for (;;) {
			const t = this.tz.next('text');
			if (t.kind === 'eof') return { nodes, stop: null };
			if (t.kind === 'directive') {
				const r = this.parseDirective(t);
				if (r.kind === 'stop') return { nodes, stop: r.stop };
				nodes.push(r.node);
				continue;
			}
			nodes.push(this.item(t));
		}
	}

	private item(t: Token): Node {
		if (t.kind === 'id') {
			if (t.value === '__LINE__') return { kind: 'CurrentLine', loc: t.loc };
			if (t.value === '__FILE__') return { kind: 'CurrentFile', loc: t.loc };
			if (this.tz.peekChar() === '(') return this.parseCall(t);
			return { kind: 'Ident', loc: t.loc, name: t.value };
		}
		return text(t.loc, t.value, t.kind === 'space');
	}

	// Arguments split on commas outside nested parentheses; `f()` has no arguments at all.
	private parseCall(name: Token): Node {
		this.tz.next('args');
		const args: Node[][] = [];
		let current: Node[] = [];
		let depth = 0;
		for (;;) {
			const t = this.tz.next('args');
			if (t.kind === 'eof') throw new ParseError(name.loc, `unterminated call to ${quoteString(name.value)}`);
			if (isPunct(t, ')') && depth === 0) {
				if (args.length > 0 || current.length > 0) args.push(current);
				return { kind: 'Ident', loc: spanLocations(name.loc, t.loc), name: name.value, args };
			}
			if (isPunct(t, ',') && depth === 0) {
				args.push(current);
				current = [];
				continue;
			}
			if (isPunct(t, '(')) depth++;
			else if (isPunct(t, ')')) depth--;
			current.push(this.item(t));
		}
	}

	private parseDirective(hash: Token): DirectiveResult {
		const head = this.tz.next('directive');
		if (head.kind === 'number') return { kind: 'node', node: this.parseLineDirective(head) };
		const at = (end: Token): Location => ({ start: hash.loc.start, end: end.loc.start });
		switch (head.value) {
			case 'define': return { kind: 'node', node: this.parseDefine(hash) };
			case 'undef': {
				const name = this.expectName('macro name');
				return { kind: 'node', node: { kind: 'Undef', loc: at(this.expectEol()), name: name.value } };
			}
			case 'include': {
				const path = this.expectString('file name');
				return { kind: 'node', node: { kind: 'Include', loc: at(this.expectEol()), path: unquote(path.value) } };
			}
			case 'error':
			case 'warning': {
				const msg = this.expectString('message');
				const loc = at(this.expectEol());
				const message = unquote(msg.value);
				return { kind: 'node', node: head.value === 'error' ? { kind: 'Error', loc, message } : { kind: 'Warning', loc, message } };
			}
			case 'ifdef':
			case 'ifndef': {
				const name = this.expectName('macro name');
				const loc = at(this.expectEol());
				const defined: BoolExpr = { kind: 'Defined', name: name.value };
				return { kind: 'node', node: this.parseCond(loc, head.value === 'ifdef' ? defined : { kind: 'Not', arg: defined }) };
			}
			case 'if': {
				const { test, eol } = this.parseCondition();
				return { kind: 'node', node: this.parseCond(at(eol), test) };
			}
			case 'elif': {
				const { test, eol } = this.parseCondition();
				return { kind: 'stop', stop: { kind: 'elif', loc: at(eol), test } };
			}
			case 'else':
			case 'endif':
				return { kind: 'stop', stop: { kind: head.value, loc: at(this.expectEol()) } };
			default:
				throw new ParseError(head.loc, `unknown directive #${head.value}`);
		}
	}

	private parseCond(loc: Location, test: BoolExpr): Node {
		const { nodes: ifTrue, stop } = this.parseItems();
		if (!stop) throw new ParseError(loc, 'missing #endif');
		switch (stop.kind) {
			case 'endif':
				return { kind: 'Cond', loc, test, ifTrue, ifFalse: [] };
			case 'elif':
				return { kind: 'Cond', loc, test, ifTrue, ifFalse: [this.parseCond(stop.loc, stop.test)] };
			case 'else': {
				const rest = this.parseItems();
				if (!rest.stop) throw new ParseError(loc, 'missing #endif');
				if (rest.stop.kind !== 'endif') throw new ParseError(rest.stop.loc, `#${rest.stop.kind} after #else`);
				return { kind: 'Cond', loc, test, ifTrue, ifFalse: rest.nodes };
			}
		}
	}

	private parseDefine(hash: Token): Node {
		const name = this.expectName('macro name');
		if (BUILTINS.has(name.value)) throw new ParseError(name.loc, `cannot redefine built-in ${name.value}`);
		let params: string[] | null = null;
		if (this.tz.peekChar() === '(') {
			this.tz.next('directive');
			params = [];
			let t = this.tz.next('directive');
			if (!isPunct(t, ')')) {
				for (;;) {
					if (t.kind !== 'id') throw new ParseError(t.loc, 'parameter name expected');
					if (params.includes(t.value)) throw new ParseError(t.loc, `duplicate parameter ${quoteString(t.value)}`);
					params.push(t.value);
					t = this.tz.next('directive');
					if (isPunct(t, ')')) break;
					if (!isPunct(t, ',')) throw new ParseError(t.loc, `',' or ')' expected, found ${describe(t)}`);
					t = this.tz.next('directive');
				}
			}
		}
		const { body, end } = this.parseBody();
		const loc = { start: hash.loc.start, end };
		return params
			? { kind: 'Defun', loc, name: name.value, params, body }
			: { kind: 'Def', loc, name: name.value, body };
	}

	// Rest of the directive line(s) with surrounding whitespace removed.
	private parseBody(): { body: Node[]; end: Position } {
		const body: Node[] = [];
		for (;;) {
			const t = this.tz.next('body');
			if (t.kind === 'eol') {
				while (body.length && isSpaceText(body[0]!)) body.shift();
				while (body.length && isSpaceText(body[body.length - 1]!)) body.pop();
				return { body, end: t.loc.start };
			}
			body.push(this.item(t));
		}
	}

	// `# 42` or `# 42 "file"`
	private parseLineDirective(num: Token): Node {
		if (!/^[0-9]+$/.test(num.value)) throw new ParseError(num.loc, `invalid line number ${num.value}`);
		const line = parseInt(num.value, 10);
		const t = this.tz.next('directive');
		if (t.kind === 'eol') return { kind: 'Line', line };
		if (t.kind !== 'string') throw new ParseError(t.loc, `file name expected, found ${describe(t)}`);
		this.expectEol();
		return { kind: 'Line', file: unquote(t.value), line };
	}

	private parseCondition(): { test: BoolExpr; eol: Token } {
		const toks: Token[] = [];
		for (;;) {
			const t = this.tz.next('directive');
			if (t.kind === 'eol') return { test: new ExprParser(new TokenStream(toks, t)).parse(), eol: t };
			toks.push(t);
		}
	}

	private expectName(what: string): Token {
		const t = this.tz.next('directive');
		if (t.kind !== 'id') throw new ParseError(t.loc, `${what} expected, found ${describe(t)}`);
		return t;
	}

	private expectString(what: string): Token {
		const t = this.tz.next('directive');
		if (t.kind !== 'string') throw new ParseError(t.loc, `${what} expected as a string literal, found ${describe(t)}`);
		return t;
	}

	private expectEol(): Token {
		const t = this.tz.next('directive');
		if (t.kind !== 'eol') throw new ParseError(t.loc, `unexpected ${describe(t)} at end of directive`);
		return t;
	}
}

// --- #if expressions ---

type Typed =
	| { type: 'bool'; expr: BoolExpr; loc: Location }
	| { type: 'arith'; expr: ArithExpr; loc: Location };

type MulOp = 'Mul' | 'Div' | 'Mod' | 'Land' | 'Lor' | 'Lxor';
const MUL_OPS: Record<string, MulOp> = {
	'*': 'Mul', '/': 'Div', '%': 'Mod', mod: 'Mod',
	'&': 'Land', land: 'Land', '|': 'Lor', lor: 'Lor', '^': 'Lxor', lxor: 'Lxor',
};
const SHIFT_OPS: Record<string, 'Lsl' | 'Lsr' | 'Asr'> = { lsl: 'Lsl', '<<': 'Lsl', lsr: 'Lsr', asr: 'Asr', '>>': 'Asr' };
const CMP_OPS = new Set(['=', '==', '<>', '!=', '<', '>', '<=', '>=']);
const RESERVED = new Set(['true', 'false', 'defined', 'not', 'mod', 'land', 'lor', 'lxor', 'lsl', 'lsr', 'asr', 'lnot']);

const isOp = (t: Token, ...values: string[]) => (t.kind === 'punct' || t.kind === 'id') && values.includes(t.value);
const opOf = <T extends string>(table: Record<string, T>, t: Token): T | undefined =>
	(t.kind === 'punct' || t.kind === 'id') && Object.prototype.hasOwnProperty.call(table, t.value) ? table[t.value] : undefined;

/*
	Precedence, loosest first: || ; && ; not/! ; comparisons ; + - ;
	* / mod land lor lxor (and C spellings) ; lsl lsr asr << >> (right-assoc) ;
	unary - lnot ~ ; primaries.
*/
class ExprParser {
	constructor(private readonly ts: TokenStream) { }

	parse(): BoolExpr {
		const first = this.ts.peek();
		if (first.kind === 'eol') throw new ParseError(first.loc, 'expression expected');
		const e = this.parseOr();
		const t = this.ts.next();
		if (t.kind !== 'eol') throw new ParseError(t.loc, `unexpected ${describe(t)} in expression`);
		return this.bool(e);
	}

	private parseOr(): Typed {
		let left = this.parseAnd();
		while (isOp(this.ts.peek(), '||')) {
			this.ts.next();
			const right = this.parseAnd();
			left = { type: 'bool', expr: { kind: 'Or', left: this.bool(left), right: this.bool(right) }, loc: spanLocations(left.loc, right.loc) };
		}
		return left;
	}

	private parseAnd(): Typed {
		let left = this.parseNot();
		while (isOp(this.ts.peek(), '&&')) {
			this.ts.next();
			const right = this.parseNot();
			left = { type: 'bool', expr: { kind: 'And', left: this.bool(left), right: this.bool(right) }, loc: spanLocations(left.loc, right.loc) };
		}
		return left;
	}

	private parseNot(): Typed {
		const t = this.ts.peek();
		if (!isOp(t, 'not', '!')) return this.parseCmp();
		this.ts.next();
		const arg = this.parseNot();
		return { type: 'bool', expr: { kind: 'Not', arg: this.bool(arg) }, loc: spanLocations(t.loc, arg.loc) };
	}

	private parseCmp(): Typed {
		const left = this.parseAdd();
		const op = this.ts.peek();
		if (op.kind !== 'punct' || !CMP_OPS.has(op.value)) return left;
		this.ts.next();
		const right = this.parseAdd();
		const a = this.arith(left), b = this.arith(right);
		const eq: BoolExpr = { kind: 'Eq', left: a, right: b };
		const lt: BoolExpr = { kind: 'Lt', left: a, right: b };
		const gt: BoolExpr = { kind: 'Gt', left: a, right: b };
		const table: Record<string, BoolExpr> = {
			'=': eq, '==': eq, '<>': { kind: 'Not', arg: eq }, '!=': { kind: 'Not', arg: eq },
			'<': lt, '>': gt, '<=': { kind: 'Not', arg: gt }, '>=': { kind: 'Not', arg: lt },
		};
		return { type: 'bool', expr: table[op.value] ?? eq, loc: spanLocations(left.loc, right.loc) };
	}

	private parseAdd(): Typed {
		let left = this.parseMul();
		for (;;) {
			const t = this.ts.peek();
			if (!isOp(t, '+', '-')) return left;
			this.ts.next();
			const right = this.parseMul();
			left = this.binary(t.value === '+' ? 'Add' : 'Sub', left, right);
		}
	}

	private parseMul(): Typed {
		let left = this.parseShift();
		for (;;) {
			const op = opOf(MUL_OPS, this.ts.peek());
			if (!op) return left;
			this.ts.next();
			const right = this.parseShift();
			left = this.binary(op, left, right);
		}
	}

	private parseShift(): Typed {
		const left = this.parseUnary();
		const op = opOf(SHIFT_OPS, this.ts.peek());
		if (!op) return left;
		this.ts.next();
		return this.binary(op, left, this.parseShift());
	}

	private parseUnary(): Typed {
		const t = this.ts.peek();
		if (isOp(t, '-')) {
			this.ts.next();
			const lit = this.ts.peek();
			// fold `-9223372036854775808`, whose magnitude alone is out of range
			if (lit.kind === 'number') {
				this.ts.next();
				return { type: 'arith', expr: { kind: 'Int', value: this.literal(lit, '-') }, loc: spanLocations(t.loc, lit.loc) };
			}
			const arg = this.parseUnary();
			return { type: 'arith', expr: { kind: 'Neg', arg: this.arith(arg) }, loc: spanLocations(t.loc, arg.loc) };
		}
		if (isOp(t, 'lnot', '~')) {
			this.ts.next();
			const arg = this.parseUnary();
			return { type: 'arith', expr: { kind: 'Lnot', arg: this.arith(arg) }, loc: spanLocations(t.loc, arg.loc) };
		}
		return this.parsePrimary();
	}

	private parsePrimary(): Typed {
		const t = this.ts.next();
		if (t.kind === 'number') return { type: 'arith', expr: { kind: 'Int', value: this.literal(t, '') }, loc: t.loc };
		if (t.kind === 'id') {
			if (t.value === 'true') return { type: 'bool', expr: { kind: 'True' }, loc: t.loc };
			if (t.value === 'false') return { type: 'bool', expr: { kind: 'False' }, loc: t.loc };
			if (t.value === 'defined') return this.parseDefined(t);
			if (RESERVED.has(t.value)) throw new ParseError(t.loc, `unexpected ${describe(t)} in expression`);
			return { type: 'arith', expr: { kind: 'Ident', loc: t.loc, name: t.value }, loc: t.loc };
		}
		if (isPunct(t, '(')) {
			const inner = this.parseOr();
			const close = this.ts.next();
			if (!isPunct(close, ')')) throw new ParseError(close.loc, `')' expected, found ${describe(close)}`);
			const loc = spanLocations(t.loc, close.loc);
			return inner.type === 'bool' ? { type: 'bool', expr: inner.expr, loc } : { type: 'arith', expr: inner.expr, loc };
		}
		throw new ParseError(t.loc, t.kind === 'eol' ? 'unexpected end of expression' : `unexpected ${describe(t)} in expression`);
	}

	// defined(NAME) or defined NAME
	private parseDefined(kw: Token): Typed {
		let t = this.ts.next();
		const paren = isPunct(t, '(');
		if (paren) t = this.ts.next();
		if (t.kind !== 'id') throw new ParseError(t.loc, `macro name expected after defined, found ${describe(t)}`);
		let end = t;
		if (paren) {
			end = this.ts.next();
			if (!isPunct(end, ')')) throw new ParseError(end.loc, `')' expected, found ${describe(end)}`);
		}
		return { type: 'bool', expr: { kind: 'Defined', name: t.value }, loc: spanLocations(kw.loc, end.loc) };
	}

	private literal(t: Token, sign: string): bigint {
		const v = parseInt64(sign + t.value);
		if (v === null) throw new ParseError(t.loc, `invalid integer literal ${sign}${t.value}`);
		return v;
	}

	private binary(op: MulOp | 'Add' | 'Sub' | 'Lsl' | 'Lsr' | 'Asr', l: Typed, r: Typed): Typed {
		const left = this.arith(l), right = this.arith(r);
		const loc = spanLocations(l.loc, r.loc);
		if (op === 'Div' || op === 'Mod') return { type: 'arith', expr: { kind: op, loc, left, right }, loc };
		return { type: 'arith', expr: { kind: op, left, right }, loc };
	}

	private bool(e: Typed): BoolExpr {
		if (e.type !== 'bool') throw new ParseError(e.loc, 'boolean expression expected');
		return e.expr;
	}

	private arith(e: Typed): ArithExpr {
		if (e.type !== 'arith') throw new ParseError(e.loc, 'integer expression expected');
		return e.expr;
	}
}
