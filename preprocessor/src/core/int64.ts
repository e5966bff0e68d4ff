// Signed 64-bit integers as bigint

export const INT64_MIN = -(1n << 63n);
export const INT64_MAX = (1n << 63n) - 1n;
const UINT64_MAX = (1n << 64n) - 1n;

export function wrap(n: bigint): bigint {
	return BigInt.asIntN(64, n);
}

// Space characters that may surround a literal in a macro body.
export function stripSpace(s: string): string {
	return s.replace(/^[ \t\n\r]+|[ \t\n\r]+$/g, '');
}

const RADIX_DIGITS: Record<string, { prefix: string; digits: RegExp }> = {
	x: { prefix: '0x', digits: /^[0-9a-f_]+$/i },
	o: { prefix: '0o', digits: /^[0-7_]+$/ },
	b: { prefix: '0b', digits: /^[01_]+$/ },
};

/**
 * Parses an integer literal: optional sign, then decimal digits or a
 * `0x`/`0o`/`0b` prefixed form; `_` may separate digits. Decimal literals must
 * fit the signed range; prefixed ones may use all 64 bits and wrap.
 * Returns null for anything else.
 */
export function parseInt64(text: string): bigint | null {
	const m = /^([+-]?)(?:0([xXoObB])(\w+)|([0-9][0-9_]*))$/.exec(text);
	if (!m) return null;
	const negative = m[1] === '-';
	if (m[2] !== undefined) {
		const radix = RADIX_DIGITS[m[2].toLowerCase()];
		const raw = m[3] ?? '';
		if (!radix || !radix.digits.test(raw) || raw.startsWith('_')) return null;
		const digits = raw.replace(/_/g, '');
		if (!digits) return null;
		const v = BigInt(radix.prefix + digits);
		if (v > UINT64_MAX) return null;
		return wrap(negative ? -v : v);
	}
	const v = BigInt((m[4] ?? '').replace(/_/g, ''));
	if (negative) return -v < INT64_MIN ? null : -v;
	return v > INT64_MAX ? null : v;
}

function shiftAmount(s: bigint): bigint | null {
	if (s >= 64n || s <= -64n) return null;
	return BigInt.asUintN(6, s);
}

export function shiftLeft(n: bigint, s: bigint): bigint {
	const k = shiftAmount(s);
	return k === null ? 0n : wrap(n << k);
}

export function shiftRightLogical(n: bigint, s: bigint): bigint {
	const k = shiftAmount(s);
	return k === null ? 0n : wrap(BigInt.asUintN(64, n) >> k);
}

export function shiftRightArith(n: bigint, s: bigint): bigint {
	const k = shiftAmount(s);
	return k === null ? 0n : n >> k;
}
