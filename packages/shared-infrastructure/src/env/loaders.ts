/**
 * Environment loading and typed readers shared by the playlist packages.
 * `.env` parsing is delegated to dotenv; values already present in
 * process.env win unless `override` is set.
 */
import { parse } from 'dotenv';
import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';

export interface LoadEnvOptions {
  cwd?: string;
  files?: string[];
  override?: boolean;
  assignToProcess?: boolean;
}

export interface LoadEnvSummary {
  loadedFiles: string[];
  missingFiles: string[];
  assignedKeys: string[];
  overriddenKeys: string[];
}

function resolveEnvFiles(options: LoadEnvOptions): string[] {
  const cwd = resolve(options.cwd ?? process.cwd());
  const files = options.files && options.files.length > 0 ? options.files : ['.env'];
  return files.map((file) => (isAbsolute(file) ? file : resolve(cwd, file)));
}

/**
 * Load `.env` files in order and report which keys were assigned, without
 * exposing their values. Earlier files take precedence unless `override`.
 */
export function loadEnvFilesWithSummary(options: LoadEnvOptions = {}): LoadEnvSummary {
  const { summary } = collectEnv(options);
  return summary;
}

/** Load `.env` files and return the collected key/value pairs. */
export function loadEnvFiles(options: LoadEnvOptions = {}): Record<string, string> {
  return collectEnv(options).collected;
}

function collectEnv(options: LoadEnvOptions): {
  collected: Record<string, string>;
  summary: LoadEnvSummary;
} {
  const override = options.override ?? false;
  const assignToProcess = options.assignToProcess ?? true;

  const collected: Record<string, string> = {};
  const loadedFiles: string[] = [];
  const missingFiles: string[] = [];
  const assignedKeys = new Set<string>();
  const overriddenKeys = new Set<string>();

  for (const file of resolveEnvFiles(options)) {
    if (!existsSync(file)) {
      missingFiles.push(file);
      continue;
    }
    loadedFiles.push(file);

    const parsed = parse(readFileSync(file, 'utf8'));
    for (const [key, value] of Object.entries(parsed)) {
      if (override || collected[key] === undefined) {
        collected[key] = value;
      }

      if (!assignToProcess) continue;
      const alreadySet = process.env[key] !== undefined;
      if (alreadySet && !override) continue;
      if (alreadySet) {
        overriddenKeys.add(key);
      } else {
        assignedKeys.add(key);
      }
      process.env[key] = value;
    }
  }

  return {
    collected,
    summary: {
      loadedFiles,
      missingFiles,
      assignedKeys: [...assignedKeys],
      overriddenKeys: [...overriddenKeys],
    },
  };
}

export function readBool(name: string, def: boolean): boolean {
  const v = process.env[name];
  if (v == null || v === '') return def;
  return v === '1' || v.toLowerCase() === 'true';
}

export function readInt(name: string, def: number): number {
  const v = process.env[name];
  if (!v) return def;
  const n = Number(v);
  return Number.isFinite(n) ? Math.trunc(n) : def;
}

export function readString(name: string, def: string): string;
export function readString(name: string, def?: string): string | undefined;
export function readString(name: string, def?: string): string | undefined {
  const v = process.env[name];
  if (v == null || v === '') return def;
  return v;
}

export function readEnum<T extends string>(name: string, allowed: readonly T[], def: T): T {
  const v = readString(name);
  if (v === undefined) return def;
  const match = allowed.find((candidate) => candidate === v);
  if (!match) {
    throw new Error(`${name} must be one of ${allowed.join(', ')} (got "${v}")`);
  }
  return match;
}
