import { readFile } from 'node:fs/promises';
import YAML from 'yaml';

export async function readText(path: string): Promise<string> {
  return await readFile(path, 'utf8');
}

/** Parsed but unvalidated; callers run the result through their schema. */
export async function readYaml(path: string): Promise<unknown> {
  const raw = await readText(path);
  const parsed: unknown = YAML.parse(raw);
  return parsed;
}
