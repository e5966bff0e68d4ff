import type { Location } from '../core/location';

export const ARITH_BINARY_OPS = ['Add', 'Sub', 'Mul', 'Lsl', 'Lsr', 'Asr', 'Land', 'Lor', 'Lxor'] as const;
export type ArithBinaryOp = typeof ARITH_BINARY_OPS[number];

// Signed 64-bit integer expressions (right-hand side of #if comparisons)
export type ArithExpr =
	| { kind: 'Int'; value: bigint }
	| { kind: 'Ident'; loc: Location; name: string }
	| { kind: 'Neg'; arg: ArithExpr }
	| { kind: 'Lnot'; arg: ArithExpr }
	| { kind: ArithBinaryOp; left: ArithExpr; right: ArithExpr }
	// division-like operators keep their location for the zero-divisor error
	| { kind: 'Div' | 'Mod'; loc: Location; left: ArithExpr; right: ArithExpr };

export type BoolExpr =
	| { kind: 'True' }
	| { kind: 'False' }
	| { kind: 'Defined'; name: string }
	| { kind: 'Not'; arg: BoolExpr }
	| { kind: 'And' | 'Or'; left: BoolExpr; right: BoolExpr }
	| { kind: 'Eq' | 'Lt' | 'Gt'; left: ArithExpr; right: ArithExpr };

export type Node =
	// `args` is absent for a bare reference, `[]` for `f()`
	| { kind: 'Ident'; loc: Location; name: string; args?: Node[][] }
	| { kind: 'Def'; loc: Location; name: string; body: Node[] }
	| { kind: 'Defun'; loc: Location; name: string; params: string[]; body: Node[] }
	| { kind: 'Undef'; loc: Location; name: string }
	| { kind: 'Include'; loc: Location; path: string }
	| { kind: 'Cond'; loc: Location; test: BoolExpr; ifTrue: Node[]; ifFalse: Node[] }
	| { kind: 'Error'; loc: Location; message: string }
	| { kind: 'Warning'; loc: Location; message: string }
	| { kind: 'Text'; loc: Location; isSpace: boolean; text: string }
	| { kind: 'Seq'; nodes: Node[] }
	| { kind: 'Line'; file?: string; line: number }
	| { kind: 'CurrentLine'; loc: Location }
	| { kind: 'CurrentFile'; loc: Location };

export type NodeKind = Node['kind'];
export type ArithKind = ArithExpr['kind'];
export type BoolKind = BoolExpr['kind'];

export const NODE_KINDS: readonly NodeKind[] = [
	'Ident', 'Def', 'Defun', 'Undef', 'Include', 'Cond', 'Error', 'Warning',
	'Text', 'Seq', 'Line', 'CurrentLine', 'CurrentFile',
];

export const ARITH_KINDS: readonly ArithKind[] = ['Int', 'Ident', 'Neg', 'Lnot', ...ARITH_BINARY_OPS, 'Div', 'Mod'];

export const BOOL_KINDS: readonly BoolKind[] = ['True', 'False', 'Defined', 'Not', 'And', 'Or', 'Eq', 'Lt', 'Gt'];

export function text(loc: Location, value: string, isSpace = false): Node {
	return { kind: 'Text', loc, isSpace, text: value };
}

export function isSpaceText(n: Node): boolean {
	return n.kind === 'Text' && n.isSpace;
}
