// Source positions, diagnostic prefixes and line-marker text

export interface Position {
	file: string;
	line: number;   // 1-based
	column: number; // 0-based, in characters from the start of the line
	offset: number; // 0-based, from the start of the file
}

export interface Location {
	start: Position;
	end: Position;
}

export function positionAt(file: string, lineStarts: readonly number[], offset: number): Position {
	let lo = 0, hi = lineStarts.length - 1;
	while (lo < hi) {
		const mid = (lo + hi + 1) >> 1;
		if (lineStarts[mid]! <= offset) lo = mid; else hi = mid - 1;
	}
	return { file, line: lo + 1, column: offset - lineStarts[lo]!, offset };
}

export function computeLineStarts(text: string): number[] {
	const starts = [0];
	for (let i = 0; i < text.length; i++) if (text[i] === '\n') starts.push(i + 1);
	return starts;
}

/** Location with both ends at the start of line 1 of `file`; used for values that come from no source text. */
export function syntheticLocation(file: string): Location {
	const pos: Position = { file, line: 1, column: 0, offset: 0 };
	return { start: pos, end: pos };
}

export function spanLocations(from: Location, to: Location): Location {
	return { start: from.start, end: to.end };
}

const utf8 = new TextEncoder();

/**
 * Double-quotes a string, escaping quotes, backslashes and control characters
 * (`\n`, `\t`, `\r`, `\b`, otherwise three-digit decimal codes). Characters
 * outside ASCII become the decimal codes of their UTF-8 bytes.
 */
export function quoteString(s: string): string {
	let out = '"';
	for (const ch of s) {
		const code = ch.codePointAt(0) ?? 0;
		if (ch === '"') out += '\\"';
		else if (ch === '\\') out += '\\\\';
		else if (ch === '\n') out += '\\n';
		else if (ch === '\t') out += '\\t';
		else if (ch === '\r') out += '\\r';
		else if (ch === '\b') out += '\\b';
		else if (code < 0x20 || code === 0x7f) out += '\\' + String(code).padStart(3, '0');
		else if (code >= 0x80) {
			for (const byte of utf8.encode(ch)) out += '\\' + String(byte).padStart(3, '0');
		}
		else out += ch;
	}
	return out + '"';
}

// `File "a.txt", line 3, characters 4-9`; both character offsets are relative to the start line.
export function formatLocation(loc: Location): string {
	const bol = loc.start.offset - loc.start.column;
	return `File ${quoteString(loc.start.file)}, line ${loc.start.line}, characters ${loc.start.column}-${loc.end.offset - bol}`;
}

/**
 * Text of a location marker placed before output that originates at `pos`.
 * The filename is only repeated when it differs from `prevFile`.
 */
export function markerText(pos: Position, prevFile: string | undefined): string {
	const head = prevFile === pos.file ? `\n# ${pos.line}\n` : `\n# ${pos.line} ${quoteString(pos.file)}\n`;
	return head + ' '.repeat(pos.column);
}

export function lineDirectiveText(line: number, file?: string): string {
	return file === undefined ? `\n# ${line}\n` : `\n# ${line} ${quoteString(file)}\n`;
}
