/**
 * File-based prompt repository.
 *
 * Prompts are stored as YAML files named `{id}-{version}.yaml`.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import * as yaml from 'yaml';
import { z } from 'zod';

import { toErrorMessage } from '../errors/utils';
import { PromptInvalidFormatError, PromptIOError, PromptNotFoundError } from './errors';
import type { FileSystem, PromptRepository, PromptTemplateData } from './types';

export interface FilePromptRepositoryOptions {
  /** Directory holding the prompt files (defaults to the bundled prompts) */
  directory?: string;
  /** Custom file system implementation (defaults to Node.js fs) */
  fs?: FileSystem;
  /** In-memory caching for reads (defaults to true) */
  cache?: boolean;
}

/** Prompts shipped with the package, one per action kind. */
export const DEFAULT_PROMPTS_DIRECTORY = fileURLToPath(new URL('../../prompts', import.meta.url));

const FILE_EXTENSION = '.yaml';

const defaultFileSystem: FileSystem = {
  readFile: (filePath: string) => fs.readFile(filePath, 'utf-8'),
  readdir: (dirPath: string) => fs.readdir(dirPath),
};

const promptFileSchema = z.object({
  id: z.string().min(1),
  version: z.string().regex(/^\d+\.\d+\.\d+$/, 'version must be semver like 1.0.0'),
  system: z.string(),
  userTemplate: z.string(),
});

function parseVersion(version: string): [number, number, number] | null {
  const match = /^(\d+)\.(\d+)\.(\d+)$/.exec(version);
  if (!match) return null;
  return [Number(match[1]), Number(match[2]), Number(match[3])];
}

/** Newest first; unparseable versions sort last. */
function compareVersionsDescending(a: string, b: string): number {
  const parsedA = parseVersion(a);
  const parsedB = parseVersion(b);

  if (!parsedA && !parsedB) return 0;
  if (!parsedA) return 1;
  if (!parsedB) return -1;

  for (let i = 0; i < 3; i++) {
    if (parsedA[i] !== parsedB[i]) {
      return parsedB[i] - parsedA[i];
    }
  }
  return 0;
}

/**
 * @example parseFileName('error-recovery-1.0.0.yaml') => { id: 'error-recovery', version: '1.0.0' }
 */
function parseFileName(fileName: string): { id: string; version: string } | null {
  if (!fileName.endsWith(FILE_EXTENSION)) return null;

  const baseName = fileName.slice(0, -FILE_EXTENSION.length);
  const lastDash = baseName.lastIndexOf('-');
  if (lastDash === -1) return null;

  const id = baseName.slice(0, lastDash);
  const version = baseName.slice(lastDash + 1);
  if (!id || !parseVersion(version)) return null;

  return { id, version };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function parsePromptYaml(content: string, promptId: string): PromptTemplateData {
  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (error) {
    throw new PromptInvalidFormatError(promptId, `Invalid YAML: ${toErrorMessage(error)}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  const result = promptFileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || 'root';
    throw new PromptInvalidFormatError(promptId, `${field}: ${issue?.message ?? 'invalid'}`);
  }
  return result.data;
}

export class FilePromptRepository implements PromptRepository {
  protected readonly directory: string;
  protected readonly fileSystem: FileSystem;
  protected readonly cacheEnabled: boolean;

  private readonly contentCache = new Map<string, PromptTemplateData>();

  constructor(options: FilePromptRepositoryOptions = {}) {
    this.directory = options.directory ?? DEFAULT_PROMPTS_DIRECTORY;
    this.fileSystem = options.fs ?? defaultFileSystem;
    this.cacheEnabled = options.cache ?? true;
  }

  async read(id: string, version?: string): Promise<PromptTemplateData> {
    if (!version) {
      return this.read(id, await this.latestVersion(id));
    }

    const cacheKey = `${id}:${version}`;
    const cached = this.cacheEnabled ? this.contentCache.get(cacheKey) : undefined;
    if (cached) {
      return cached;
    }

    const filePath = path.join(this.directory, `${id}-${version}${FILE_EXTENSION}`);

    let content: string;
    try {
      content = await this.fileSystem.readFile(filePath);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new PromptNotFoundError(id, version);
      }
      throw new PromptIOError('read', filePath, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    const prompt = parsePromptYaml(content, id);
    if (prompt.id !== id || prompt.version !== version) {
      throw new PromptInvalidFormatError(
        id,
        `File content mismatch: expected id='${id}' version='${version}', got id='${prompt.id}' version='${prompt.version}'`
      );
    }

    if (this.cacheEnabled) {
      this.contentCache.set(cacheKey, prompt);
    }
    return prompt;
  }

  private async latestVersion(id: string): Promise<string> {
    let files: string[];
    try {
      files = await this.fileSystem.readdir(this.directory);
    } catch (error) {
      throw new PromptIOError('list', this.directory, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    const versions = files
      .map(parseFileName)
      .filter((parsed): parsed is { id: string; version: string } => parsed?.id === id)
      .map((parsed) => parsed.version)
      .sort(compareVersionsDescending);

    const latest = versions[0];
    if (!latest) {
      throw new PromptNotFoundError(id);
    }
    return latest;
  }
}

export function createFilePromptRepository(options: FilePromptRepositoryOptions = {}): PromptRepository {
  return new FilePromptRepository(options);
}
