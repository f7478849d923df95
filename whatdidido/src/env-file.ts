/**
 * Line-oriented `KEY=VALUE` codec for the config file.
 *
 * A document is kept as its original lines so that rewriting one entry
 * leaves every other line (entries, comments, blanks, malformed lines)
 * byte-for-byte unchanged.
 */

import type { ConfigEntry, RawConfig } from '../schemas/index.js';

export interface EnvLine {
  /** Line text as it appears in the file, without the trailing newline */
  raw: string;
  /** Present only for lines that parse as an entry */
  entry?: ConfigEntry;
}

/**
 * Parse one line. The first `=` splits key from value; both are trimmed.
 * Lines without `=`, with an empty key, or starting with `#` carry no entry.
 */
export function parseEnvLine(raw: string): EnvLine {
  const trimmed = raw.trim();
  if (trimmed.length === 0 || trimmed.startsWith('#')) {
    return { raw };
  }

  const separator = raw.indexOf('=');
  if (separator === -1) {
    return { raw };
  }

  const key = raw.slice(0, separator).trim();
  if (key.length === 0) {
    return { raw };
  }

  return { raw, entry: { key, value: raw.slice(separator + 1).trim() } };
}

export function parseEnvDocument(content: string): EnvLine[] {
  if (content.length === 0) {
    return [];
  }

  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map(parseEnvLine);
}

export function serializeEnvDocument(lines: readonly EnvLine[]): string {
  if (lines.length === 0) {
    return '';
  }
  return `${lines.map((line) => line.raw).join('\n')}\n`;
}

export function formatEntry(key: string, value: string): EnvLine {
  return { raw: `${key}=${value}`, entry: { key, value } };
}

/**
 * Collapse a document into a key/value map; later duplicates win.
 */
export function toRawConfig(lines: readonly EnvLine[]): RawConfig {
  const config: RawConfig = {};
  for (const line of lines) {
    if (line.entry) {
      config[line.entry.key] = line.entry.value;
    }
  }
  return config;
}

/**
 * Apply upserts in order. An existing key is rewritten at its first line and
 * any later duplicate lines for it are dropped; a new key is appended.
 */
export function applyUpserts(
  lines: readonly EnvLine[],
  entries: readonly ConfigEntry[]
): EnvLine[] {
  let result = [...lines];

  for (const { key, value } of entries) {
    const first = result.findIndex((line) => line.entry?.key === key);
    if (first === -1) {
      result.push(formatEntry(key, value));
      continue;
    }

    result = result.filter((line, index) => index <= first || line.entry?.key !== key);
    result[first] = formatEntry(key, value);
  }

  return result;
}

/**
 * Drop every line for the given keys
 */
export function removeEntries(
  lines: readonly EnvLine[],
  keys: readonly string[]
): { lines: EnvLine[]; removed: string[] } {
  const targets = new Set(keys);
  const removed = new Set<string>();

  const kept = lines.filter((line) => {
    if (line.entry && targets.has(line.entry.key)) {
      removed.add(line.entry.key);
      return false;
    }
    return true;
  });

  return { lines: kept, removed: [...targets].filter((key) => removed.has(key)) };
}
