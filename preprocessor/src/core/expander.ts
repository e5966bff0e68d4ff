import type { Node } from '../ast';
import { AssertNever, plural } from '../utils';
import type { MacroDef, MacroEnv } from './env';
import { ArityError, IncludeCycleError, MacroNameError, type PreprocWarning, UserDirectiveError } from './errors';
import { evalBool } from './eval';
import type { IncludeResolver } from './include';
import { type Location, type Position, lineDirectiveText, markerText, quoteString } from './location';

// Append-only output shared by every expander of a run.
export class OutputBuffer {
	private readonly chunks: string[] = [];

	append(s: string) {
		if (s) this.chunks.push(s);
	}

	toString(): string {
		return this.chunks.join('');
	}
}

/**
 * Line-marker state of one top-level source: whether a marker is owed before
 * the next non-blank text, and the file named by the last marker written.
 */
export class MarkerState {
	owed = true;
	lastFile: string | undefined = undefined;
}

export interface ExpanderOptions {
	includes: IncludeResolver;
	onWarning: (w: PreprocWarning) => void;
	// When false, owed markers are dropped instead of written; explicit `# n` lines still are.
	lineDirectives: boolean;
}

/*
	Recursive expansion of a Node tree. The environment is threaded through
	siblings and returned; output goes to the shared buffer. A nested expander
	is created for each include (ancestry grows by one file) and for the
	outermost macro invocation (fixes the location reported by __LINE__/__FILE__).
*/
export class Expander {
	constructor(
		private readonly out: OutputBuffer,
		private readonly marks: MarkerState,
		private readonly opts: ExpanderOptions,
		readonly ancestry: readonly string[] = [],
		private readonly callLoc: Location | null = null,
	) { }

	expand(env: MacroEnv, nodes: readonly Node[]): MacroEnv {
		let cur = env;
		for (const node of nodes) cur = this.expandNode(cur, node);
		return cur;
	}

	private expandNode(env: MacroEnv, node: Node): MacroEnv {
		switch (node.kind) {
			case 'Ident':
				return this.expandIdent(env, node);
			case 'Def':
			case 'Defun': {
				this.marks.owed = true;
				if (env.has(node.name)) throw new MacroNameError(node.loc, `${quoteString(node.name)} is already defined`);
				const def: MacroDef = node.kind === 'Def'
					? { kind: 'object', loc: node.loc, name: node.name, body: node.body, env }
					: { kind: 'function', loc: node.loc, name: node.name, params: node.params, body: node.body, env };
				return env.bind(def);
			}
			case 'Undef':
				this.marks.owed = true;
				return env.unbind(node.name);
			// text after an include or a conditional resumes at a different source line
			case 'Include': {
				this.marks.owed = true;
				const next = this.include(env, node.loc, node.path);
				this.marks.owed = true;
				return next;
			}
			case 'Cond': {
				const branch = evalBool(env, node.test) ? node.ifTrue : node.ifFalse;
				this.marks.owed = true;
				const next = this.expand(env, branch);
				this.marks.owed = true;
				return next;
			}
			case 'Error':
				throw new UserDirectiveError(node.loc, node.message);
			case 'Warning':
				this.opts.onWarning({ loc: node.loc, message: node.message });
				return env;
			case 'Text':
				this.emit(node.loc, node.text, node.isSpace);
				return env;
			case 'Seq':
				return this.expand(env, node.nodes);
			case 'Line':
				this.marks.owed = true;
				this.out.append(lineDirectiveText(node.line, node.file));
				return env;
			case 'CurrentLine':
			case 'CurrentFile': {
				this.flushMarker(node.loc.start);
				this.marks.owed = true;
				const at = (this.callLoc ?? node.loc).start;
				this.out.append(node.kind === 'CurrentLine' ? ` ${at.line} ` : ` ${quoteString(at.file)} `);
				return env;
			}
			default:
				return AssertNever(node, 'Unknown node');
		}
	}

	private expandIdent(env: MacroEnv, node: Extract<Node, { kind: 'Ident' }>): MacroEnv {
		const { loc, name, args } = node;
		const def = env.lookup(name);
		if (!def) {
			this.flushMarker(loc.start);
			this.marks.owed = false;
			if (!args) {
				this.emit(loc, name, false);
				return env;
			}
			// unknown call: reproduce it with each argument expanded
			this.emit(loc, `${name}(`, false);
			args.forEach((arg, i) => {
				if (i > 0) this.emit(loc, ',', false);
				this.expand(env, arg);
			});
			this.emit(loc, ')', false);
			return env;
		}

		this.marks.owed = true;
		const body = this.callLoc === null ? this.withCallLocation(loc) : this;
		if (def.kind === 'object') {
			if (args) throw new MacroNameError(loc, `${quoteString(name)} expects no arguments`);
			body.expand(def.env, def.body);
			return env;
		}

		const argc = def.params.length;
		if (!args) {
			throw new ArityError(loc, `${quoteString(name)} expects ${argc} argument${plural(argc)} but is applied to none.`, argc, null);
		}
		// `f()` passes one empty argument to a one-parameter macro
		const actual = args.length === 0 && argc === 1 ? [[]] : args;
		if (actual.length !== argc) {
			throw new ArityError(
				loc,
				`${quoteString(name)} expects ${argc} argument${plural(argc)} but is applied to ${actual.length} argument${plural(actual.length)}.`,
				argc,
				actual.length,
			);
		}
		// parameters are object macros over the argument text, evaluated in the caller's environment
		const appEnv = def.env.bindAll(def.params.map((param, i): MacroDef => ({ kind: 'object', loc, name: param, body: actual[i] ?? [], env })));
		body.expand(appEnv, def.body);
		return env;
	}

	private include(env: MacroEnv, loc: Location, target: string): MacroEnv {
		const file = this.opts.includes.resolve(target, loc);
		if (this.ancestry.includes(file.id)) throw new IncludeCycleError(loc, file.name);
		const nodes = this.opts.includes.load(file);
		const nested = new Expander(this.out, this.marks, this.opts, [...this.ancestry, file.id], this.callLoc);
		return nested.expand(env, nodes);
	}

	private withCallLocation(loc: Location): Expander {
		return new Expander(this.out, this.marks, this.opts, this.ancestry, loc);
	}

	// Non-blank text pays any owed marker first.
	private emit(loc: Location, s: string, isSpace: boolean) {
		if (!isSpace) {
			this.flushMarker(loc.start);
			this.marks.owed = false;
		}
		this.out.append(s);
	}

	private flushMarker(pos: Position) {
		if (!this.marks.owed || !this.opts.lineDirectives) return;
		this.out.append(markerText(pos, this.marks.lastFile));
		this.marks.lastFile = pos.file;
	}
}
