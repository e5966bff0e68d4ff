// Token model shared by the tokenizer and the directive parser

import type { Location } from './location';

export type TokenKind =
	| 'id'
	| 'number'    // any word starting with a digit; validated only inside #if expressions
	| 'string'
	| 'comment'
	| 'space'
	| 'punct'
	| 'directive' // the `#` (with its indentation) that opens a directive line
	| 'eol'       // end of a directive line
	| 'eof';

export interface Token {
	kind: TokenKind;
	value: string;
	loc: Location;
}

// Buffered view over an already scanned token list, with pushback.
export class TokenStream {
	private idx = 0;
	private readonly pushback: Token[] = [];

	constructor(private readonly arr: readonly Token[], private readonly end: Token) { }

	next(): Token {
		const t = this.pushback.pop();
		if (t) return t;
		if (this.idx < this.arr.length) return this.arr[this.idx++]!;
		return this.end;
	}

	peek(): Token {
		const t = this.next();
		this.pushBack(t);
		return t;
	}

	pushBack(t: Token) {
		if (t === this.end) return;
		this.pushback.push(t);
	}
}
