import fs from 'node:fs/promises';
import { hasErrorCode } from '../errors/InternalError.js';

export class FsSafe {
	async exists(p: string): Promise<boolean> {
		try {
			await fs.lstat(p);
			return true;
		} catch (err) {
			if (hasErrorCode(err, 'ENOENT', 'ENOTDIR')) return false;
			throw err;
		}
	}

	/**
	 * Rename without replacing an existing target. Busy files (Windows, network shares)
	 * are retried a few times before giving up.
	 */
	async rename(from: string, to: string): Promise<void> {
		const maxAttempts = 10;
		for (let i = 0; i < maxAttempts; i++) {
			if ((await this.exists(to)) && !(await sameEntry(from, to))) {
				throw Object.assign(new Error(`target exists: ${to}`), { code: 'EEXIST', path: to });
			}
			try {
				await fs.rename(from, to);
				return;
			} catch (err) {
				if (hasErrorCode(err, 'EBUSY') && i < maxAttempts - 1) {
					await delay(50 + Math.floor(Math.random() * 100));
					continue;
				}
				throw err;
			}
		}
	}
}

// Case-only renames on case-insensitive volumes report the target as present; that is
// only safe when both names resolve to the same inode.
async function sameEntry(from: string, to: string): Promise<boolean> {
	if (from === to || from.toLowerCase() !== to.toLowerCase()) return false;
	const [a, b] = await Promise.all([fs.lstat(from), fs.lstat(to)]);
	return a.dev === b.dev && a.ino === b.ino;
}

function delay(ms: number) {
	return new Promise((res) => setTimeout(res, ms));
}
