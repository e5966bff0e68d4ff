import type { Node } from '../ast';
import type { Location } from './location';

// A definition keeps the environment that was current where it was defined.
export type MacroDef =
	| { kind: 'object'; loc: Location; name: string; body: readonly Node[]; env: MacroEnv }
	| { kind: 'function'; loc: Location; name: string; params: readonly string[]; body: readonly Node[]; env: MacroEnv };

// Layers stacked by `bind`/`unbind` before they are folded into one map.
const MAX_LAYERS = 32;

// `null` marks a name removed by `unbind`.
type Layer = ReadonlyMap<string, MacroDef | null>;

/**
 * Immutable macro table. `bind` and `unbind` return a new environment and
 * leave the receiver untouched, so definitions can hold on to the environment
 * they were created in.
 *
 * Each environment is a small layer over a parent. Once `MAX_LAYERS` layers
 * pile up, the next change starts from a folded copy.
 */
export class MacroEnv {
	static readonly empty: MacroEnv = new MacroEnv(null, new Map(), 0);

	private constructor(
		private readonly parent: MacroEnv | null,
		private readonly layer: Layer,
		private readonly depth: number,
	) { }

	get size(): number {
		return this.flatten().size;
	}

	has(name: string): boolean {
		return this.lookup(name) !== undefined;
	}

	lookup(name: string): MacroDef | undefined {
		for (let env: MacroEnv | null = this; env !== null; env = env.parent) {
			const def = env.layer.get(name);
			if (def !== undefined) return def ?? undefined;
		}
		return undefined;
	}

	// In order of first definition.
	names(): string[] {
		return [...this.flatten().keys()];
	}

	// Adds or replaces the binding for `def.name`.
	bind(def: MacroDef): MacroEnv {
		return this.extend(new Map([[def.name, def]]));
	}

	unbind(name: string): MacroEnv {
		if (!this.has(name)) return this;
		return this.extend(new Map([[name, null]]));
	}

	/**
	 * Binds every definition in one layer, later ones winning on equal names.
	 * The layer is never folded; meant for the parameters of a macro call.
	 */
	bindAll(defs: readonly MacroDef[]): MacroEnv {
		if (defs.length === 0) return this;
		return new MacroEnv(this, new Map(defs.map((d): [string, MacroDef] => [d.name, d])), this.depth + 1);
	}

	private extend(layer: Layer): MacroEnv {
		if (this.depth < MAX_LAYERS) return new MacroEnv(this, layer, this.depth + 1);
		const flat = this.flatten();
		apply(flat, layer);
		return new MacroEnv(null, flat, 0);
	}

	private flatten(): Map<string, MacroDef> {
		const layers: Layer[] = [];
		for (let env: MacroEnv | null = this; env !== null; env = env.parent) layers.push(env.layer);
		const flat = new Map<string, MacroDef>();
		for (let i = layers.length - 1; i >= 0; i--) apply(flat, layers[i]!);
		return flat;
	}
}

function apply(flat: Map<string, MacroDef>, layer: Layer) {
	for (const [name, def] of layer) {
		if (def === null) flat.delete(name);
		else flat.set(name, def);
	}
}
