/**
 * Credential storage
 *
 * Persists every provider's settings in one flat `KEY=VALUE` file
 * (~/.whatdidido/config.env by default). Writes go to a temp file in the same
 * directory and are renamed over the original, so an interrupted process
 * leaves either the old or the new file, never a mix.
 */

import { randomBytes } from 'crypto';
import { access, constants as fsConstants, mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import type { ConfigEntry, RawConfig } from '../schemas/index.js';
import { ConfigEntrySchema } from '../schemas/index.js';
import {
  applyUpserts,
  parseEnvDocument,
  removeEntries,
  serializeEnvDocument,
  toRawConfig,
  type EnvLine,
} from './env-file.js';
import { StorageError, ValidationError, getErrorMessage, isNodeError } from './errors.js';
import { log } from './log.js';

const DIR_MODE = 0o700;
const FILE_MODE = 0o600;

/**
 * Pairs accepted by upsertMany: a plain object or an ordered list of tuples
 */
export type ConfigPairs = Readonly<Record<string, string>> | ReadonlyArray<readonly [string, string]>;

export class CredentialStore {
  constructor(readonly path: string) {}

  /**
   * Create the config directory and an empty file when either is missing
   */
  async ensureStoreExists(): Promise<void> {
    await this.ensureDirectory();

    try {
      await writeFile(this.path, '', { encoding: 'utf8', flag: 'wx', mode: FILE_MODE });
      log.debug(`Created empty config file at ${this.path}`);
    } catch (error) {
      if (isNodeError(error) && error.code === 'EEXIST') {
        return;
      }
      throw new StorageError('Failed to create config file', this.path, error);
    }
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.path, fsConstants.F_OK);
      return true;
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return false;
      }
      throw new StorageError('Failed to access config file', this.path, error);
    }
  }

  /**
   * Parse the file into key/value pairs. A missing file reads as empty.
   */
  async readAll(): Promise<RawConfig> {
    return toRawConfig(await this.readLines());
  }

  async upsert(key: string, value: string): Promise<void> {
    await this.upsertMany([[key, value]]);
  }

  /**
   * Apply several upserts with one read and one atomic write.
   * Every pair is validated before anything touches the disk.
   * @throws ValidationError naming the rejected keys; nothing is written
   */
  async upsertMany(pairs: ConfigPairs): Promise<void> {
    const entries = validatePairs(pairs);
    if (entries.length === 0) {
      return;
    }

    const lines = await this.readLines();
    await this.writeDocument(applyUpserts(lines, entries));
    log.debug(`Saved ${entries.map((entry) => entry.key).join(', ')} to ${this.path}`);
  }

  /**
   * Remove the given keys in one atomic write
   * @returns the keys that were present
   */
  async removeMany(keys: readonly string[]): Promise<string[]> {
    const lines = await this.readLines();
    const result = removeEntries(lines, keys);

    if (result.removed.length === 0) {
      log.debug(`None of ${keys.join(', ')} present in ${this.path}`);
      return [];
    }

    await this.writeDocument(result.lines);
    log.debug(`Removed ${result.removed.join(', ')} from ${this.path}`);
    return result.removed;
  }

  private async ensureDirectory(): Promise<void> {
    const dir = dirname(this.path);
    try {
      await mkdir(dir, { recursive: true, mode: DIR_MODE });
    } catch (error) {
      throw new StorageError(`Failed to create config directory ${dir}`, this.path, error);
    }
  }

  /**
   * The file as parsed lines, comments and malformed lines included
   */
  async readLines(): Promise<EnvLine[]> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        log.debug(`Config file not found at ${this.path}`);
        return [];
      }
      throw new StorageError('Failed to read config file', this.path, error);
    }
    return parseEnvDocument(content);
  }

  private async writeDocument(lines: readonly EnvLine[]): Promise<void> {
    await this.ensureDirectory();

    const tempPath = join(
      dirname(this.path),
      `.${basename(this.path)}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`
    );

    try {
      await writeFile(tempPath, serializeEnvDocument(lines), { encoding: 'utf8', mode: FILE_MODE });
      await rename(tempPath, this.path);
    } catch (error) {
      await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        log.debug(`Failed to remove temp file ${tempPath}: ${getErrorMessage(cleanupError)}`);
      });
      throw new StorageError('Failed to write config file', this.path, error);
    }
  }
}

function validatePairs(pairs: ConfigPairs): ConfigEntry[] {
  const list: ReadonlyArray<readonly [string, string]> = isPairList(pairs)
    ? pairs
    : Object.entries(pairs);

  const entries: ConfigEntry[] = [];
  const invalidKeys: Record<string, string> = {};

  for (const [key, value] of list) {
    const parsed = ConfigEntrySchema.safeParse({ key, value });
    if (!parsed.success) {
      invalidKeys[key === '' ? '(empty key)' : key] = parsed.error.issues
        .map((issue) => issue.message)
        .join(', ');
      continue;
    }
    entries.push({ key: parsed.data.key, value: parsed.data.value.trim() });
  }

  if (Object.keys(invalidKeys).length > 0) {
    throw new ValidationError({ invalidKeys, label: 'config entries' });
  }

  return entries;
}

function isPairList(
  pairs: ConfigPairs
): pairs is ReadonlyArray<readonly [string, string]> {
  return Array.isArray(pairs);
}
