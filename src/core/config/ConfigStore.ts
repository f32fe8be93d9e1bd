import fs from 'node:fs/promises';
import path from 'node:path';
import type { IConfig, IConfigStore, ILogger } from '../../types/index.js';
import { isDateSource } from '../datetime/FallbackClock.js';
import { isNodeError } from '../errors/InternalError.js';
import { configDir, defaultUndoLogPath } from '../../utils/paths.js';

export function defaultConfig(): IConfig {
  return {
    prefixDate: true,
    discardExistingName: false,
    addTime: false,
    dateSource: 'earliest',
    lowercaseExtension: true,
    maxYearsBehind: 30,
    maxYearsAhead: 5,
    exclude: [],
    undoLog: defaultUndoLogPath()
  };
}

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((x) => typeof x === 'string');
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isYearOffset(v: unknown): v is number {
  return typeof v === 'number' && Number.isInteger(v) && v >= 0 && v <= 1000;
}

/**
 * Merge a parsed config file over the defaults, field by field. Returns the names of
 * fields that were present but unusable so the caller can report them.
 */
export function validateConfig(input: unknown): { config: IConfig; invalid: string[] } {
  const cfg = defaultConfig();
  const invalid: string[] = [];
  if (!isRecord(input)) return { config: cfg, invalid: ['<root>'] };

  const bool = (key: 'prefixDate' | 'discardExistingName' | 'addTime' | 'lowercaseExtension') => {
    const v = input[key];
    if (v === undefined) return;
    if (typeof v === 'boolean') cfg[key] = v;
    else invalid.push(key);
  };
  bool('prefixDate');
  bool('discardExistingName');
  bool('addTime');
  bool('lowercaseExtension');

  if (input.dateSource !== undefined) {
    if (isDateSource(input.dateSource)) cfg.dateSource = input.dateSource;
    else invalid.push('dateSource');
  }
  if (input.maxYearsBehind !== undefined) {
    if (isYearOffset(input.maxYearsBehind)) cfg.maxYearsBehind = input.maxYearsBehind;
    else invalid.push('maxYearsBehind');
  }
  if (input.maxYearsAhead !== undefined) {
    if (isYearOffset(input.maxYearsAhead)) cfg.maxYearsAhead = input.maxYearsAhead;
    else invalid.push('maxYearsAhead');
  }
  if (input.exclude !== undefined) {
    if (isStringArray(input.exclude)) cfg.exclude = input.exclude.filter((g) => g.trim().length > 0);
    else invalid.push('exclude');
  }
  if (input.undoLog !== undefined) {
    if (input.undoLog === null || input.undoLog === false) cfg.undoLog = null;
    else if (typeof input.undoLog === 'string' && input.undoLog.trim().length > 0) cfg.undoLog = path.resolve(input.undoLog.trim());
    else invalid.push('undoLog');
  }
  return { config: cfg, invalid };
}

export class ConfigStore implements IConfigStore {
  private current: IConfig | null = null;

  constructor(private readonly logger?: ILogger) {}

  get file(): string {
    return path.join(configDir(), 'config.json');
  }

  async get(): Promise<IConfig> {
    if (this.current) return this.current;
    let raw: string;
    try {
      raw = await fs.readFile(this.file, 'utf8');
    } catch (err: unknown) {
      if (isNodeError(err) && err.code === 'ENOENT') {
        this.current = defaultConfig();
        return this.current;
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err: unknown) {
      // Keep the file for manual fixing; run on defaults meanwhile.
      this.logger?.warn(`ignoring ${this.file}: ${err instanceof Error ? err.message : String(err)}`);
      this.current = defaultConfig();
      return this.current;
    }

    const { config, invalid } = validateConfig(parsed);
    if (invalid.length) {
      this.logger?.warn(`ignoring invalid settings in ${this.file}: ${invalid.join(', ')}`);
    }
    this.current = config;
    return config;
  }
}
