import fs from 'node:fs';
import path from 'node:path';
import type { Node } from '../ast';
import { parseSource } from '../ast/parser';
import { debugLog } from '../utils';
import { IncludeError } from './errors';
import type { Location } from './location';

// Whole-file, synchronous access to sources; tests substitute an in-memory host.
export interface SourceHost {
	readFile(file: string): string;
	isFile(file: string): boolean;
}

export const nodeHost: SourceHost = {
	readFile: file => fs.readFileSync(file, 'utf8'),
	isFile: file => {
		try { return fs.statSync(file).isFile(); } catch { return false; }
	},
};

export interface ResolvedFile {
	id: string;   // absolute path; identity for cycle detection
	name: string; // path as shown in markers and diagnostics; parse cache key
}

export type ParseFn = (file: string, text: string) => Node[];

export interface IncludeResolverOptions {
	host: SourceHost;
	includePaths: readonly string[];
	parse?: ParseFn;
}

// Pseudo file names such as `<stdin>` or `<command line>` have no directory.
export function isPseudoFile(file: string): boolean {
	return file.startsWith('<') && file.endsWith('>');
}

export function sourceId(file: string): string {
	return isPseudoFile(file) ? file : path.resolve(file);
}

/**
 * Finds and parses included files. A target is looked up next to the
 * including file, then in each include path, then relative to the working
 * directory. Parsed trees are cached per spelling of the resolved path for the
 * lifetime of the resolver, so repeated sibling inclusions parse once and each
 * spelling keeps its own file name in locations.
 */
export class IncludeResolver {
	private readonly cache = new Map<string, readonly Node[]>();
	private readonly parse: ParseFn;

	constructor(private readonly opts: IncludeResolverOptions) {
		this.parse = opts.parse ?? parseSource;
	}

	candidates(target: string, fromFile: string): string[] {
		if (path.isAbsolute(target)) return [target];
		const out: string[] = [];
		if (!isPseudoFile(fromFile)) out.push(path.join(path.dirname(fromFile), target));
		for (const dir of this.opts.includePaths) out.push(path.join(dir, target));
		out.push(target);
		return out;
	}

	resolve(target: string, from: Location): ResolvedFile {
		for (const name of this.candidates(target, from.start.file)) {
			if (this.opts.host.isFile(name)) {
				debugLog('PREPROC_DEBUG_INCLUDES', '[include]', target, '->', name);
				return { id: sourceId(name), name };
			}
		}
		throw new IncludeError(from, target);
	}

	load(file: ResolvedFile): readonly Node[] {
		const cached = this.cache.get(file.name);
		if (cached) return cached;
		const nodes = this.parse(file.name, this.opts.host.readFile(file.name));
		this.cache.set(file.name, nodes);
		return nodes;
	}
}
