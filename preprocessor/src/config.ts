import fs from 'node:fs/promises';
import path from 'node:path';
import yaml from 'js-yaml';
import Ajv2020 from 'ajv/dist/2020';
import schema from '../../common/preprocConfigSchema.json';
import type { MacroDefines, PreprocessOptions, WarningMode } from './core/pipeline';

export const CONFIG_FILE_NAMES = ['preproc.yaml', 'preproc.yml'] as const;

// Shape accepted by the schema; every key is optional.
export interface ConfigFile {
	includePaths?: string[];
	defines?: MacroDefines;
	lineDirectives?: boolean;
	warnings?: WarningMode;
}

export interface PreprocConfig {
	includePaths: string[];
	defines: MacroDefines;
	lineDirectives: boolean;
	warnings: WarningMode;
}

const ajv = new Ajv2020({ allErrors: true, strict: false });
const validate = ajv.compile<ConfigFile>(schema);

/**
 * Parses and validates YAML configuration text. Relative include paths are
 * resolved against the directory of `source` when one is given.
 */
export function parseConfig(raw: string, source?: string): PreprocConfig {
	const obj: unknown = yaml.load(raw, { json: true }) ?? {};
	if (!validate(obj)) {
		const msg = (validate.errors || []).map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join('\n');
		throw new Error(`Configuration${source ? ` "${source}"` : ''} failed schema validation:\n${msg}`);
	}
	const baseDir = source ? path.dirname(source) : undefined;
	return {
		includePaths: (obj.includePaths ?? []).map(p => baseDir ? path.resolve(baseDir, p) : p),
		defines: { ...(obj.defines ?? {}) },
		lineDirectives: obj.lineDirectives ?? true,
		warnings: obj.warnings ?? 'show',
	};
}

export async function loadConfig(file: string): Promise<PreprocConfig> {
	const raw = await fs.readFile(file, 'utf8');
	return parseConfig(raw, path.resolve(file));
}

// First of CONFIG_FILE_NAMES present in `dir`, or null.
export async function findConfigFile(dir: string): Promise<string | null> {
	for (const name of CONFIG_FILE_NAMES) {
		const candidate = path.join(dir, name);
		try {
			const stat = await fs.stat(candidate);
			if (stat.isFile()) return candidate;
		} catch (err) {
			if (!isNotFound(err)) throw err;
		}
	}
	return null;
}

function isNotFound(err: unknown): boolean {
	return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export function optionsFromConfig(config: PreprocConfig): PreprocessOptions {
	return {
		includePaths: config.includePaths,
		defines: config.defines,
		lineDirectives: config.lineDirectives,
		warnings: config.warnings,
	};
}
