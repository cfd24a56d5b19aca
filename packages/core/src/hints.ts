// ============================================================================
// @hintpack/core — Hint Tables
// ============================================================================

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { HintTableError } from './errors.js';
import { debug } from './logger.js';
import { isTypeTag } from './resolver.js';
import type { TypeHintTable } from './types.js';

const hintTableSchema = z.record(
  z.string(),
  z.array(z.string().min(1, 'type tag must not be empty')).min(1, 'hint sequence must not be empty'),
);

export interface ParseHintOptions {
  /**
   * Reject unknown tags up front. Off by default: an unknown tag is only an
   * error once a number actually resolves through it.
   */
  checkTags?: boolean;
}

/**
 * Validate an untrusted hint table (e.g. parsed from a hints file).
 *
 * @example
 * ```ts
 * parseHintTable({ ChangeOn: ['uint64'], '': ['int64', 'uint64'] });
 * parseHintTable({ Fee: [] }); // throws HintTableError
 * ```
 */
export function parseHintTable(input: unknown, options: ParseHintOptions = {}): TypeHintTable {
  const result = hintTableSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue.path.length > 0 ? String(issue.path[0]) : undefined;
    const where = key === undefined ? 'hint table' : `hint "${key}"`;
    throw new HintTableError(`Invalid ${where}: ${issue.message}`, key);
  }

  if (options.checkTags) {
    for (const [key, tags] of Object.entries(result.data)) {
      const unknown = tags.find((tag) => !isTypeTag(tag));
      if (unknown !== undefined) {
        throw new HintTableError(`Invalid hint "${key}": unknown type tag "${unknown}"`, key);
      }
    }
  }

  return result.data;
}

/**
 * Read and validate a JSON hints file.
 */
export function loadHintTable(path: string, options: ParseHintOptions = {}): TypeHintTable {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (e) {
    throw new HintTableError(`Cannot read hints file ${path}`, undefined, { cause: e });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new HintTableError(`Hints file ${path} is not valid JSON: ${reason}`, undefined, { cause: e });
  }

  const table = parseHintTable(parsed, options);
  debug('loaded hint table', { path, keys: Object.keys(table).length });
  return table;
}
