/**
 * Key/value memoization used to skip reparsing a container that has been seen
 * before. Parsers never depend on a store; the loader consults one if given.
 */

import fs from 'fs-extra';
import * as path from 'node:path';
import registerDebug from 'debug';
import { z } from 'zod';

const debug = registerDebug('wordhoard:cache');

export interface KeyValueStore<T> {
  get(key: string): T | undefined;
  set(key: string, value: T): void;
}

export class MemoryStore<T> implements KeyValueStore<T> {
  private values = new Map<string, T>();

  get(key: string): T | undefined {
    return this.values.get(key);
  }

  set(key: string, value: T): void {
    this.values.set(key, value);
  }
}

/**
 * All values kept in one JSON file, read once on construction and rewritten
 * on every set. Values are validated on load; a file that fails to parse or
 * validate is treated as an empty cache.
 */
export class JsonFileStore<T> implements KeyValueStore<T> {
  private values: Map<string, T>;

  constructor(
    private readonly filePath: string,
    private readonly schema: z.ZodType<T>
  ) {
    this.values = this.load();
  }

  private load(): Map<string, T> {
    if (!fs.pathExistsSync(this.filePath)) {
      return new Map();
    }

    let raw: unknown;
    try {
      raw = fs.readJsonSync(this.filePath);
    } catch (err) {
      debug('ignoring unreadable cache %s: %s', this.filePath, err);
      return new Map();
    }

    const parsed = z.record(this.schema).safeParse(raw);
    if (!parsed.success) {
      debug('ignoring invalid cache %s: %s', this.filePath, parsed.error.message);
      return new Map();
    }
    return new Map(Object.entries(parsed.data));
  }

  get(key: string): T | undefined {
    const value = this.values.get(key);
    if (value !== undefined) {
      debug('cached in %s: %s', this.filePath, key);
    }
    return value;
  }

  set(key: string, value: T): void {
    this.values.set(key, value);
    fs.ensureDirSync(path.dirname(this.filePath));
    fs.writeJsonSync(this.filePath, Object.fromEntries(this.values));
  }
}
