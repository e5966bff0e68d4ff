// Small shared utilities

/**
 * Compile-time exhaustiveness helper for switches over tagged unions. Reaching
 * it at runtime means a value was built outside the declared union.
 */
export function AssertNever(x: never, message?: string): never {
	const v: unknown = x;
	const tag = typeof v === 'object' && v !== null && 'kind' in v ? String(v.kind) : String(v);
	throw new Error(message ?? `Unexpected value in AssertNever: ${tag}`);
}

// Trace output for an opt-in debug channel, e.g. PREPROC_DEBUG_INCLUDES=1.
export function debugLog(flag: string, ...args: unknown[]): void {
	if (process.env[flag]) console.log(...args);
}

export function plural(n: number): string {
	return n === 1 ? '' : 's';
}
