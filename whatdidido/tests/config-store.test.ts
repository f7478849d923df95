import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdir, readFile, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import { CredentialStore } from '../src/config-store.js';
import { StorageError, ValidationError } from '../src/errors.js';
import { makeTempDir, removeTempDir } from './helpers/tmp.js';

let dir: string;
let configPath: string;
let store: CredentialStore;

async function readConfig(): Promise<string> {
  return readFile(configPath, 'utf8');
}

describe('CredentialStore', () => {
  beforeEach(async () => {
    dir = await makeTempDir('store');
    configPath = join(dir, '.whatdidido', 'config.env');
    store = new CredentialStore(configPath);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('ensureStoreExists', () => {
    it('should create the directory and an empty file', async () => {
      await store.ensureStoreExists();

      expect(await readConfig()).toBe('');
      expect(await store.exists()).toBe(true);
    });

    it('should be idempotent', async () => {
      await store.ensureStoreExists();
      await store.ensureStoreExists();

      expect(await readConfig()).toBe('');
      expect(await readdir(join(dir, '.whatdidido'))).toEqual(['config.env']);
    });

    it('should not touch an existing file', async () => {
      await store.upsert('GITHUB_TOKEN', 'test-token');
      await store.ensureStoreExists();

      expect(await readConfig()).toBe('GITHUB_TOKEN=test-token\n');
    });

    it('should create the file with owner-only permissions', async () => {
      await store.ensureStoreExists();

      const info = await stat(configPath);
      expect(info.mode & 0o777).toBe(0o600);
    });

    it('should raise StorageError when the directory cannot be created', async () => {
      await writeFile(join(dir, 'blocker'), 'not a directory');
      const blocked = new CredentialStore(join(dir, 'blocker', 'config.env'));

      await expect(blocked.ensureStoreExists()).rejects.toBeInstanceOf(StorageError);
    });
  });

  describe('readAll', () => {
    it('should return an empty mapping when the file does not exist', async () => {
      expect(await store.readAll()).toEqual({});
      expect(await store.exists()).toBe(false);
    });

    it('should parse entries with the lenient line rules', async () => {
      await store.ensureStoreExists();
      await writeFile(
        configPath,
        [
          ' JIRA_URL = https://example.atlassian.net ',
          'no equals sign here',
          'JIRA_USERNAME=dev@example.com',
          '',
          'CALLBACK=https://example.com/?a=b=c',
          'JIRA_USERNAME=other@example.com',
        ].join('\n')
      );

      expect(await store.readAll()).toEqual({
        JIRA_URL: 'https://example.atlassian.net',
        JIRA_USERNAME: 'other@example.com',
        CALLBACK: 'https://example.com/?a=b=c',
      });
    });

    it('should raise StorageError when the path cannot be read', async () => {
      const directoryAsFile = new CredentialStore(dir);

      await expect(directoryAsFile.readAll()).rejects.toBeInstanceOf(StorageError);
    });
  });

  describe('upsert', () => {
    it('should append a new key to an empty file', async () => {
      await store.ensureStoreExists();
      await store.upsert('X', 'y');

      expect(await readConfig()).toBe('X=y\n');
    });

    it('should replace an existing key and keep unrelated keys in order', async () => {
      await store.ensureStoreExists();
      await writeFile(configPath, 'A=1\nB=2\n');

      await store.upsert('A', '9');

      expect(await readConfig()).toBe('A=9\nB=2\n');
    });

    it('should create the file lazily on first write', async () => {
      await store.upsert('GITHUB_TOKEN', 'test-token');

      expect(await readConfig()).toBe('GITHUB_TOKEN=test-token\n');
      const info = await stat(configPath);
      expect(info.mode & 0o777).toBe(0o600);
    });

    it('should preserve comments, blank and malformed lines', async () => {
      await store.ensureStoreExists();
      await writeFile(configPath, '# my settings\nJIRA_URL=https://a.example.com\n\nnot a line\nGITHUB_TOKEN=old\n');

      await store.upsert('GITHUB_TOKEN', 'new');

      expect(await readConfig()).toBe(
        '# my settings\nJIRA_URL=https://a.example.com\n\nnot a line\nGITHUB_TOKEN=new\n'
      );
    });

    it('should leave CRLF lines of other keys untouched', async () => {
      await store.ensureStoreExists();
      await writeFile(configPath, 'A=1\r\nB=2\r\n');

      await store.upsert('B', '3');

      expect(await readConfig()).toBe('A=1\r\nB=3\n');
    });

    it('should keep values containing equals signs intact', async () => {
      await store.upsert('JIRA_API_KEY', 'abc=def==');

      expect(await store.readAll()).toEqual({ JIRA_API_KEY: 'abc=def==' });
    });

    it('should trim surrounding whitespace from values', async () => {
      await store.upsert('JIRA_USERNAME', '  dev@example.com  ');

      expect(await readConfig()).toBe('JIRA_USERNAME=dev@example.com\n');
    });

    it('should reject values with line breaks', async () => {
      await expect(store.upsert('GITHUB_TOKEN', 'line1\nINJECTED=1')).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(await store.exists()).toBe(false);
    });

    it('should leave no temp files behind', async () => {
      await store.upsert('A', '1');
      await store.upsert('B', '2');
      await store.upsert('A', '3');

      expect(await readdir(join(dir, '.whatdidido'))).toEqual(['config.env']);
    });

    it('should raise StorageError when the directory is unwritable', async () => {
      await writeFile(join(dir, 'blocker'), 'not a directory');
      const blocked = new CredentialStore(join(dir, 'blocker', 'config.env'));

      await expect(blocked.upsert('A', '1')).rejects.toBeInstanceOf(StorageError);
    });
  });

  describe('upsertMany', () => {
    it('should write every pair in one batch', async () => {
      await store.ensureStoreExists();
      await store.upsertMany([
        ['A', '1'],
        ['B', '2'],
      ]);

      expect(await readConfig()).toBe('A=1\nB=2\n');
      expect(await store.readAll()).toEqual({ A: '1', B: '2' });
    });

    it('should accept a plain object', async () => {
      await store.upsertMany({ JIRA_URL: 'https://example.atlassian.net', JIRA_USERNAME: 'dev@example.com' });

      expect(await readConfig()).toBe(
        'JIRA_URL=https://example.atlassian.net\nJIRA_USERNAME=dev@example.com\n'
      );
    });

    it('should write nothing when any pair is invalid', async () => {
      await store.upsert('A', '1');

      const attempt = store.upsertMany([
        ['B', '2'],
        ['lowercase', '3'],
      ]);

      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      expect(await readConfig()).toBe('A=1\n');
    });

    it('should name the rejected keys', async () => {
      try {
        await store.upsertMany([
          ['bad-key', '1'],
          ['GOOD', '2'],
        ]);
        expect.unreachable('upsertMany should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(Object.keys(error.invalidKeys)).toEqual(['bad-key']);
        }
      }
    });

    it('should do nothing for an empty batch', async () => {
      await store.upsertMany([]);

      expect(await store.exists()).toBe(false);
    });

    it('should reflect the last value written per key', async () => {
      await store.upsert('A', '1');
      await store.upsertMany([
        ['B', '2'],
        ['A', '3'],
      ]);
      await store.upsert('C', '4');
      await store.upsert('B', '5');

      expect(await store.readAll()).toEqual({ A: '3', B: '5', C: '4' });
    });
  });

  describe('removeMany', () => {
    it('should remove only the named keys', async () => {
      await store.upsertMany([
        ['A', '1'],
        ['B', '2'],
        ['C', '3'],
      ]);

      const removed = await store.removeMany(['A', 'C', 'Z']);

      expect(removed).toEqual(['A', 'C']);
      expect(await readConfig()).toBe('B=2\n');
    });

    it('should not rewrite the file when no key is present', async () => {
      await store.ensureStoreExists();
      await writeFile(configPath, 'A=1');

      expect(await store.removeMany(['Z'])).toEqual([]);
      expect(await readConfig()).toBe('A=1');
    });
  });
});
