import { ParseError } from './errors';
import { type Location, type Position, computeLineStarts, positionAt } from './location';
import type { Token, TokenKind } from './tokens';

export const DIRECTIVES = new Set(['define', 'undef', 'include', 'if', 'ifdef', 'ifndef', 'elif', 'else', 'endif', 'error', 'warning']);

/*
	Scanning depends on where the parser is:
	- 'text': ordinary source; a `#` opening a directive line yields a 'directive' token
	- 'args': inside the parentheses of a macro call; no directives are recognised
	- 'directive': directive operands; blanks, comments and line continuations are skipped
	- 'body': a #define body; blanks are kept, a continuation becomes a '\n' space token
	Directive and body scanning end with an 'eol' token that consumes the newline.
*/
export type ScanMode = 'text' | 'args' | 'directive' | 'body';

const TWO_CHAR_OPS = new Set(['&&', '||', '==', '!=', '<>', '<=', '>=', '<<', '>>']);

const isBlank = (ch: string | undefined) => ch === ' ' || ch === '\t';
const isSpace = (ch: string | undefined) => ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
const isIdStart = (ch: string | undefined) => !!ch && /[A-Za-z_]/.test(ch);
const isIdContinue = (ch: string | undefined) => !!ch && /[A-Za-z0-9_]/.test(ch);
const isDigit = (ch: string | undefined) => !!ch && ch >= '0' && ch <= '9';

export class Tokenizer {
	private i = 0;
	private readonly n: number;
	private readonly lineStarts: number[];

	constructor(private readonly text: string, readonly file: string) {
		this.n = text.length;
		this.lineStarts = computeLineStarts(text);
	}

	// Character right after the last token, used to tell `f(` calls from `f (`.
	peekChar(): string | undefined {
		return this.text[this.i];
	}

	position(offset = this.i): Position {
		return positionAt(this.file, this.lineStarts, offset);
	}

	location(start: number, end: number): Location {
		return { start: this.position(start), end: this.position(end) };
	}

	next(mode: ScanMode): Token {
		const lineMode = mode === 'directive' || mode === 'body';
		for (;;) {
			if (this.i >= this.n) return this.mk(lineMode ? 'eol' : 'eof', '', this.i, this.i);
			const c = this.text[this.i]!;
			if (lineMode) {
				const cont = this.continuationEnd(this.i);
				if (cont !== null) {
					if (mode === 'body') return this.take('space', '\n', cont);
					this.i = cont; continue;
				}
				if (c === '\n') return this.take('eol', '\n', this.i + 1);
				if (c === '\r' && this.text[this.i + 1] === '\n') return this.take('eol', '\n', this.i + 2);
				if (isBlank(c)) {
					let j = this.i + 1; while (isBlank(this.text[j])) j++;
					if (mode === 'body') return this.take('space', this.text.slice(this.i, j), j);
					this.i = j; continue;
				}
				if (mode === 'directive' && c === '/' && (this.text[this.i + 1] === '/' || this.text[this.i + 1] === '*')) {
					this.i = this.commentEnd(this.i); continue;
				}
			} else {
				if (mode === 'text' && this.directiveAt(this.i)) {
					let j = this.i; while (this.text[j] !== '#') j++;
					return this.take('directive', '#', j + 1, j);
				}
				if (isSpace(c)) {
					let j = this.i;
					while (j < this.n && isSpace(this.text[j])) {
						j++;
						// leave the next line's indentation to the directive token
						if (this.text[j - 1] === '\n' && mode === 'text' && this.directiveAt(j)) break;
					}
					return this.take('space', this.text.slice(this.i, j), j);
				}
			}
			return this.scanWord(mode);
		}
	}

	private scanWord(mode: ScanMode): Token {
		const s = this.i;
		const c = this.text[s]!;
		if (c === '"') {
			const e = this.stringEnd(s);
			return this.take('string', this.text.slice(s, e), e);
		}
		if (c === '/' && (this.text[s + 1] === '/' || this.text[s + 1] === '*')) {
			const e = this.commentEnd(s);
			return this.take('comment', this.text.slice(s, e), e);
		}
		if (isIdStart(c) || isDigit(c)) {
			let j = s + 1; while (isIdContinue(this.text[j])) j++;
			return this.take(isDigit(c) ? 'number' : 'id', this.text.slice(s, j), j);
		}
		if (mode === 'directive') {
			const two = this.text.slice(s, s + 2);
			if (TWO_CHAR_OPS.has(two)) return this.take('punct', two, s + 2);
		}
		return this.take('punct', c, s + 1);
	}

	// Whether a directive line starts at `pos`: line start, blanks, `#`, blanks, then a directive name or a line number.
	private directiveAt(pos: number): boolean {
		if (pos > 0 && this.text[pos - 1] !== '\n') return false;
		let j = pos; while (isBlank(this.text[j])) j++;
		if (this.text[j] !== '#') return false;
		j++; while (isBlank(this.text[j])) j++;
		if (isDigit(this.text[j])) return true;
		let k = j; while (isIdContinue(this.text[k])) k++;
		return DIRECTIVES.has(this.text.slice(j, k));
	}

	// `\` followed by optional blanks and a newline; returns the offset after the newline.
	private continuationEnd(pos: number): number | null {
		if (this.text[pos] !== '\\') return null;
		let k = pos + 1; while (isBlank(this.text[k])) k++;
		if (this.text[k] === '\n') return k + 1;
		if (this.text[k] === '\r' && this.text[k + 1] === '\n') return k + 2;
		return null;
	}

	private stringEnd(s: number): number {
		let j = s + 1;
		while (j < this.n) {
			const ch = this.text[j]!;
			if (ch === '\\') { j += 2; continue; }
			if (ch === '"') return j + 1;
			j++;
		}
		throw new ParseError(this.location(s, this.n), 'unterminated string literal');
	}

	// Unterminated block comments run to the end of the input.
	private commentEnd(s: number): number {
		if (this.text[s + 1] === '/') {
			let j = s + 2; while (j < this.n && this.text[j] !== '\n') j++;
			return j;
		}
		const close = this.text.indexOf('*/', s + 2);
		return close < 0 ? this.n : close + 2;
	}

	private take(kind: TokenKind, value: string, end: number, start = this.i): Token {
		const t = this.mk(kind, value, start, end);
		this.i = end;
		return t;
	}

	private mk(kind: TokenKind, value: string, start: number, end: number): Token {
		return { kind, value, loc: this.location(start, end) };
	}
}

/** Unescapes the contents of a double-quoted literal token. */
export function unquote(raw: string): string {
	const inner = raw.slice(1, -1);
	return inner.replace(/\\(?:([0-9]{3})|(.))/gs, (_m, dec: string | undefined, ch: string | undefined) => {
		if (dec !== undefined) return String.fromCharCode(parseInt(dec, 10));
		switch (ch) {
			case 'n': return '\n';
			case 't': return '\t';
			case 'r': return '\r';
			case 'b': return '\b';
			default: return ch ?? '';
		}
	});
}
