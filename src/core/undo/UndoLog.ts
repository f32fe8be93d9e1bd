import fs from 'node:fs/promises';
import path from 'node:path';
import type { IUndoLog } from '../../types/index.js';
import { hasErrorCode } from '../errors/InternalError.js';
import { shellComment, shellQuote } from '../../utils/shell.js';

const HEADER = '#!/bin/sh\n# Undo log for normalize-filename. Run the mv commands bottom-up to revert.\n';

/**
 * Append-only shell script of inverse renames. Each successful rename adds a comment
 * line and one `mv -n` that moves the file back.
 */
export class UndoLog implements IUndoLog {
  private ensured = false;

  constructor(
    readonly location: string,
    private readonly clock: () => Date = () => new Date()
  ) {}

  private async ensure() {
    if (this.ensured) return;
    await fs.mkdir(path.dirname(this.location), { recursive: true });
    try {
      await fs.writeFile(this.location, HEADER, { encoding: 'utf8', flag: 'wx', mode: 0o755 });
    } catch (e: unknown) {
      if (!hasErrorCode(e, 'EEXIST')) throw e;
    }
    this.ensured = true;
  }

  async record(from: string, to: string): Promise<void> {
    await this.ensure();
    const lines = [
      shellComment(`${this.clock().toISOString()} renamed ${from} to ${to}`),
      `mv -n ${shellQuote(to)} ${shellQuote(from)}`
    ];
    await fs.appendFile(this.location, `${lines.join('\n')}\n`, 'utf8');
  }
}

/** Stand-in used for dry runs and `--no-undo-log`. */
export class NullUndoLog implements IUndoLog {
  readonly location = '';
  async record(): Promise<void> {}
}
