import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema, parseSpecification } from '../schema/index.js';
import type { FileConfig, Specification } from '../schema/index.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.specrun.yaml` (or JSON) config file.
 * A missing file yields an empty config; an invalid one throws.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return {};
    throw err;
  }

  return fileConfigSchema.parse(parseDocument(configPath, raw) ?? {});
}

/**
 * Load a structured specification from YAML or JSON.
 * Throws `InvalidSpecificationError` when the shape is wrong.
 */
export async function loadSpecificationFile(
  specPath: string,
): Promise<Specification> {
  const raw = await readFile(specPath, 'utf-8');
  return parseSpecification(parseDocument(specPath, raw));
}

// ── Helpers ─────────────────────────────────────────────────

function parseDocument(filePath: string, raw: string): unknown {
  return filePath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
