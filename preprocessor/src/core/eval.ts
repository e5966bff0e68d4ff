import type { ArithExpr, BoolExpr, Node } from '../ast';
import { isSpaceText } from '../ast';
import { AssertNever } from '../utils';
import type { MacroEnv } from './env';
import { EvaluationError, MacroNameError, PreprocessorError } from './errors';
import { parseInt64, shiftLeft, shiftRightArith, shiftRightLogical, stripSpace, wrap } from './int64';
import { type Location, quoteString } from './location';

// Value of a macro used inside an #if expression. Function-like macros are never expanded here.
// `aliases` holds the names already followed on the way here.
function resolveIdent(env: MacroEnv, loc: Location, name: string, aliases: readonly string[] = []): bigint {
	const def = env.lookup(name);
	if (!def) throw new MacroNameError(loc, `Undefined identifier ${quoteString(name)}`);
	if (def.kind === 'function') throw new EvaluationError(loc, `${quoteString(name)} expects arguments`);
	if (aliases.includes(name)) throw new EvaluationError(loc, `Cyclic alias ${quoteString(name)}`);
	try {
		return bodyValue(env, loc, name, def.body, [...aliases, name]);
	} catch (err) {
		if (err instanceof PreprocessorError) {
			throw new EvaluationError(loc, `Identifier ${quoteString(name)} does not expand to an int:\n${err.message}`, { cause: err });
		}
		throw err;
	}
}

function bodyValue(env: MacroEnv, loc: Location, name: string, body: readonly Node[], aliases: readonly string[]): bigint {
	const significant = body.filter(n => !isSpaceText(n));
	const only = significant.length === 1 ? significant[0] : undefined;
	// alias: `#define B A` looks A up where the expression is evaluated
	if (only && only.kind === 'Ident' && !only.args) return resolveIdent(env, only.loc, only.name, aliases);
	let s = '';
	for (const n of body) {
		if (n.kind !== 'Text') throw new EvaluationError(loc, `Identifier ${quoteString(name)} is not bound to a constant`);
		s += n.text;
	}
	const v = parseInt64(stripSpace(s));
	if (v === null) throw new EvaluationError(loc, `Identifier ${quoteString(name)} is not bound to an int literal`);
	return v;
}

export function evalArith(env: MacroEnv, expr: ArithExpr): bigint {
	switch (expr.kind) {
		case 'Int': return expr.value;
		case 'Ident': return resolveIdent(env, expr.loc, expr.name);
		case 'Neg': return wrap(-evalArith(env, expr.arg));
		case 'Lnot': return ~evalArith(env, expr.arg);
		case 'Add': return wrap(evalArith(env, expr.left) + evalArith(env, expr.right));
		case 'Sub': return wrap(evalArith(env, expr.left) - evalArith(env, expr.right));
		case 'Mul': return wrap(evalArith(env, expr.left) * evalArith(env, expr.right));
		case 'Div':
		case 'Mod': {
			const a = evalArith(env, expr.left);
			const b = evalArith(env, expr.right);
			if (b === 0n) throw new EvaluationError(expr.loc, 'Division by zero');
			// bigint division truncates toward zero and the remainder follows the dividend
			return expr.kind === 'Div' ? wrap(a / b) : a % b;
		}
		case 'Lsl': return shiftLeft(evalArith(env, expr.left), evalArith(env, expr.right));
		case 'Lsr': return shiftRightLogical(evalArith(env, expr.left), evalArith(env, expr.right));
		case 'Asr': return shiftRightArith(evalArith(env, expr.left), evalArith(env, expr.right));
		case 'Land': return evalArith(env, expr.left) & evalArith(env, expr.right);
		case 'Lor': return evalArith(env, expr.left) | evalArith(env, expr.right);
		case 'Lxor': return evalArith(env, expr.left) ^ evalArith(env, expr.right);
		default: return AssertNever(expr, 'Unknown arithmetic expression');
	}
}

// && and || short-circuit.
export function evalBool(env: MacroEnv, expr: BoolExpr): boolean {
	switch (expr.kind) {
		case 'True': return true;
		case 'False': return false;
		case 'Defined': return env.has(expr.name);
		case 'Not': return !evalBool(env, expr.arg);
		case 'And': return evalBool(env, expr.left) && evalBool(env, expr.right);
		case 'Or': return evalBool(env, expr.left) || evalBool(env, expr.right);
		case 'Eq': return evalArith(env, expr.left) === evalArith(env, expr.right);
		case 'Lt': return evalArith(env, expr.left) < evalArith(env, expr.right);
		case 'Gt': return evalArith(env, expr.left) > evalArith(env, expr.right);
		default: return AssertNever(expr, 'Unknown boolean expression');
	}
}
