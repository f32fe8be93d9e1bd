import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { describe, it, beforeEach, afterEach, expect, vi } from 'vitest';
import { ConfigStore, validateConfig } from './ConfigStore.js';

let tempRoot: string;

beforeEach(async () => {
	tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'normalize-filename-config-'));
	process.env.NORMALIZE_FILENAME_HOME = path.join(tempRoot, 'config');
	process.env.NORMALIZE_FILENAME_STATE = path.join(tempRoot, 'state');
});

afterEach(async () => {
	delete process.env.NORMALIZE_FILENAME_HOME;
	delete process.env.NORMALIZE_FILENAME_STATE;
	await fs.rm(tempRoot, { recursive: true, force: true });
});

async function writeConfig(content: string) {
	const dir = path.join(tempRoot, 'config');
	await fs.mkdir(dir, { recursive: true });
	await fs.writeFile(path.join(dir, 'config.json'), content, 'utf8');
}

describe('ConfigStore', () => {
	it('provides defaults when no file exists', async () => {
		const store = new ConfigStore();
		const cfg = await store.get();
		expect(cfg.prefixDate).toBe(true);
		expect(cfg.dateSource).toBe('earliest');
		expect(cfg.maxYearsBehind).toBe(30);
		expect(cfg.maxYearsAhead).toBe(5);
		expect(cfg.undoLog).toBe(path.join(tempRoot, 'state', 'undo.sh'));
	});

	it('merges valid fields from the config file', async () => {
		await writeConfig(JSON.stringify({ addTime: true, dateSource: 'latest', exclude: ['*.tmp'], undoLog: false }));
		const cfg = await new ConfigStore().get();
		expect(cfg.addTime).toBe(true);
		expect(cfg.dateSource).toBe('latest');
		expect(cfg.exclude).toEqual(['*.tmp']);
		expect(cfg.undoLog).toBeNull();
		expect(cfg.lowercaseExtension).toBe(true);
	});

	it('falls back to defaults and warns on unparseable JSON', async () => {
		await writeConfig('{ not json');
		const warn = vi.fn();
		const store = new ConfigStore({ info: vi.fn(), warn, error: vi.fn() });
		const cfg = await store.get();
		expect(cfg.addTime).toBe(false);
		expect(warn).toHaveBeenCalledTimes(1);
	});

	it('reports invalid fields and keeps their defaults', async () => {
		await writeConfig(JSON.stringify({ maxYearsAhead: -1, dateSource: 'yesterday', addTime: 'yes' }));
		const warn = vi.fn();
		const cfg = await new ConfigStore({ info: vi.fn(), warn, error: vi.fn() }).get();
		expect(cfg.maxYearsAhead).toBe(5);
		expect(cfg.dateSource).toBe('earliest');
		expect(cfg.addTime).toBe(false);
		expect(warn.mock.calls[0]?.[0]).toContain('addTime, dateSource, maxYearsAhead');
	});
});

describe('validateConfig', () => {
	it('rejects a non-object root', () => {
		expect(validateConfig([1, 2]).invalid).toEqual(['<root>']);
	});

	it('drops blank exclusion globs', () => {
		expect(validateConfig({ exclude: ['*.bak', '  '] }).config.exclude).toEqual(['*.bak']);
	});
});
