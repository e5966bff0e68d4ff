import { describe, it, expect } from 'vitest';
import { ArityError, MacroNameError, UserDirectiveError } from '../src/core/errors';
import type { PreprocWarning } from '../src/core/errors';
import { preprocessText } from '../src/core/pipeline';
import { catchError, expandPlain } from './testUtils';

describe('expansion: identity', () => {
	it('reproduces macro-free text', () => {
		const src = 'let x = f(a, (b)) + "s" /* c */\n  y\t z\n';
		expect(expandPlain(src)).toBe(src);
	});

	it('reproduces unknown calls with their arguments expanded', () => {
		expect(expandPlain('#define X 5\nf(X, (a,b))\n')).toBe('f(5, (a,b))\n');
	});
});

describe('expansion: lexical scoping', () => {
	it('keeps the definition environment after #undef', () => {
		expect(expandPlain('#define A 1\n#define B A\n#undef A\nB\n')).toBe('1\n');
	});

	it('does not see definitions made after the macro', () => {
		expect(expandPlain('#define B A\n#define A 1\nB\n')).toBe('A\n');
	});

	it('evaluates arguments in the caller environment', () => {
		expect(expandPlain('#define F(x) x\n#define A outer\nF(A)\n')).toBe('outer\n');
	});

	it('lets parameters shadow macros of the same name', () => {
		expect(expandPlain('#define x 1\n#define F(x) x\nF(2)\n')).toBe('2\n');
	});
});

describe('expansion: function macros', () => {
	it('substitutes each parameter occurrence', () => {
		expect(expandPlain('#define F(x) x x\nF(hi)\n')).toBe('hi hi\n');
		expect(expandPlain('#define PAIR(a, b) <a|b>\nPAIR(1, two)\n')).toBe('<1| two>\n');
	});

	it('passes one empty argument for empty parentheses', () => {
		expect(expandPlain('#define F(x) x\n[F()]\n')).toBe('[]\n');
	});

	it('reports the expected and actual argument counts', () => {
		const err = catchError(() => expandPlain('#define F(x) x x\nF(a, b)\n'), ArityError);
		expect(err.expected).toBe(1);
		expect(err.actual).toBe(2);
		expect(err.detail).toBe('"F" expects 1 argument but is applied to 2 arguments.');
	});

	it('rejects a function macro used without arguments', () => {
		const err = catchError(() => expandPlain('#define G(a, b) a\nG\n'), ArityError);
		expect(err.actual).toBeNull();
		expect(err.detail).toBe('"G" expects 2 arguments but is applied to none.');
	});

	it('rejects arguments to an object macro', () => {
		const err = catchError(() => expandPlain('#define A 1\nA(2)\n'), MacroNameError);
		expect(err.detail).toBe('"A" expects no arguments');
	});

	it('rejects an empty call to a two-parameter macro', () => {
		const err = catchError(() => expandPlain('#define G(a, b) a\nG()\n'), ArityError);
		expect(err.detail).toBe('"G" expects 2 arguments but is applied to 0 arguments.');
	});
});

describe('expansion: definitions', () => {
	it('rejects redefinition without #undef', () => {
		const err = catchError(() => expandPlain('#define A 1\n#define A 2\n'), MacroNameError);
		expect(err.detail).toBe('"A" is already defined');
		expect(err.loc.start.line).toBe(2);
	});

	it('allows redefinition after #undef and ignores unknown names', () => {
		expect(expandPlain('#undef NEVER\n#define A 1\n#undef A\n#define A 2\nA\n')).toBe('2\n');
	});
});

describe('expansion: conditionals', () => {
	it('expands exactly one branch', () => {
		const src = '#define DEBUG 1\n#if DEBUG = 1\nyes\n#else\nno\n#endif\n';
		expect(expandPlain(src)).toBe('yes\n');
	});

	it('skips definitions in the untaken branch', () => {
		expect(expandPlain('#if false\n#define Q 1\n#endif\n#ifdef Q\nq\n#endif\nend\n')).toBe('end\n');
	});

	it('selects the first true #elif', () => {
		const src = '#define N 2\n#if N = 1\none\n#elif N = 2\ntwo\n#elif N > 1\nmany\n#endif\n';
		expect(expandPlain(src)).toBe('two\n');
	});
});

describe('expansion: user diagnostics', () => {
	it('stops at #error', () => {
		const err = catchError(() => expandPlain('before\n#error "stop here"\nafter\n'), UserDirectiveError);
		expect(err.detail).toBe('stop here');
		expect(err.message).toBe('File "<stdin>", line 2, characters 0-18\nError: stop here');
	});

	it('reports #warning and continues', () => {
		const seen: PreprocWarning[] = [];
		const out = expandPlain('#warning "careful"\nok\n', { onWarning: w => { seen.push(w); } });
		expect(out).toBe('ok\n');
		expect(seen.map(w => w.message)).toEqual(['careful']);
		expect(seen[0]?.loc.start.line).toBe(1);
	});

	it('drops or escalates warnings by configuration', () => {
		expect(expandPlain('#warning "w"\nok\n', { warnings: 'ignore' })).toBe('ok\n');
		const err = catchError(() => expandPlain('#warning "w"\nok\n', { warnings: 'error' }), UserDirectiveError);
		expect(err.detail).toBe('w');
	});
});

describe('expansion: current line and file', () => {
	it('reports the directive position outside macros', () => {
		expect(expandPlain('a\n__LINE__ __FILE__\n', { file: 'm.txt' })).toBe('a\n 2   "m.txt" \n');
	});

	it('reports the outermost invocation from inside macro bodies', () => {
		expect(expandPlain('#define L __LINE__\n#define M L\n\nM\n')).toBe('\n 4 \n');
	});

	it('reports the call site for built-ins passed as arguments', () => {
		expect(expandPlain('#define ID(x) x\nID(__LINE__)\n')).toBe(' 2 \n');
	});
});

describe('expansion: environment threading', () => {
	it('returns the final environment', () => {
		const { env } = preprocessText('#define A 1\n#define F(x) x\n#undef A\n', { lineDirectives: false });
		expect(env.names()).toEqual(['F']);
		expect(env.lookup('F')?.kind).toBe('function');
	});
});
