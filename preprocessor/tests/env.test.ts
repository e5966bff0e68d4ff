import { describe, it, expect } from 'vitest';
import { MacroEnv, type MacroDef } from '../src/core/env';
import { syntheticLocation } from '../src/core/location';
import { expandPlain } from './testUtils';

const loc = syntheticLocation('env');
const def = (name: string, text = ''): MacroDef => ({
	kind: 'object',
	loc,
	name,
	body: text ? [{ kind: 'Text', loc, isSpace: false, text }] : [],
	env: MacroEnv.empty,
});

describe('macro environment', () => {
	it('leaves earlier environments untouched', () => {
		const a = MacroEnv.empty.bind(def('A'));
		const ab = a.bind(def('B'));
		const b = ab.unbind('A');
		expect(a.names()).toEqual(['A']);
		expect(ab.names()).toEqual(['A', 'B']);
		expect(b.names()).toEqual(['B']);
		expect(b.lookup('A')).toBeUndefined();
		expect(ab.lookup('A')?.name).toBe('A');
	});

	it('returns the same environment when unbinding an unknown name', () => {
		const env = MacroEnv.empty.bind(def('A'));
		expect(env.unbind('NOPE')).toBe(env);
	});

	it('keeps bindings and removals across many changes', () => {
		let env = MacroEnv.empty;
		for (let i = 0; i < 100; i++) env = env.bind(def(`M${i}`, String(i)));
		for (let i = 0; i < 100; i += 2) env = env.unbind(`M${i}`);
		env = env.bind(def('M0', 'again'));
		expect(env.size).toBe(51);
		expect(env.has('M2')).toBe(false);
		expect(env.lookup('M99')?.body).toEqual([{ kind: 'Text', loc, isSpace: false, text: '99' }]);
		expect(env.lookup('M0')?.body).toEqual([{ kind: 'Text', loc, isSpace: false, text: 'again' }]);
		expect(env.names().slice(0, 3)).toEqual(['M1', 'M3', 'M5']);
		expect(env.names().at(-1)).toBe('M0');
	});

	it('binds a scope in one step with later names winning', () => {
		const base = MacroEnv.empty.bind(def('x', 'outer'));
		expect(base.bindAll([])).toBe(base);
		const scope = base.bindAll([def('x', 'first'), def('y'), def('x', 'second')]);
		expect(scope.names()).toEqual(['x', 'y']);
		expect(scope.lookup('x')?.body).toEqual([{ kind: 'Text', loc, isSpace: false, text: 'second' }]);
		expect(base.lookup('x')?.body).toEqual([{ kind: 'Text', loc, isSpace: false, text: 'outer' }]);
	});

	it('expands many calls under many definitions quickly', () => {
		const lines: string[] = [];
		for (let i = 0; i < 3000; i++) lines.push(`#define D${i} ${i}`);
		lines.push('#define F(a, b, c) a b c');
		for (let i = 0; i < 5000; i++) lines.push('F(x, y, z)');
		const started = performance.now();
		const out = expandPlain(lines.join('\n') + '\n');
		const elapsed = performance.now() - started;
		expect(out).toBe('x  y  z\n'.repeat(5000));
		expect(elapsed).toBeLessThan(5_000);
	}, 20_000);
});
