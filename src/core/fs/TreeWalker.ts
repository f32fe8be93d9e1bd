import fs from 'node:fs/promises';
import path from 'node:path';
import type { WalkEntry } from '../../types/index.js';
import type { Matcher } from '../rename/Matcher.js';

export type WalkOptions = {
	recursive: boolean;
	matcher: Matcher;
};

async function toEntry(p: string): Promise<WalkEntry> {
	const st = await fs.lstat(p);
	return { path: p, isDirectory: st.isDirectory(), ctime: st.ctime, mtime: st.mtime };
}

/**
 * Yields the entries to rename for one command-line path, in a stable order.
 *
 * Without `recursive` the path itself is the only entry. With it, a directory's
 * children are visited sorted by name, each subdirectory's contents before the
 * subdirectory; the root keeps its name. Symlinks are never followed.
 */
export async function* walkTree(root: string, opts: WalkOptions): AsyncGenerator<WalkEntry> {
	const rootEntry = await toEntry(root);
	if (!opts.recursive || !rootEntry.isDirectory) {
		yield rootEntry;
		return;
	}
	yield* walkChildren(root, opts);
}

async function* walkChildren(dir: string, opts: WalkOptions): AsyncGenerator<WalkEntry> {
	const names = (await fs.readdir(dir)).sort(compareNames);
	for (const name of names) {
		if (opts.matcher.isExcluded(name)) continue;
		const full = path.join(dir, name);
		const entry = await toEntry(full);
		if (entry.isDirectory) yield* walkChildren(full, opts);
		yield entry;
	}
}

function compareNames(a: string, b: string): number {
	if (a === b) return 0;
	return a < b ? -1 : 1;
}
