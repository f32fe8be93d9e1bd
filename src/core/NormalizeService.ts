import path from 'node:path';
import type { IConfig, ILogger, IPrompter, IUndoLog, RunOptions, WalkEntry } from '../types/index.js';
import type { RunSummary, ServiceEventMap } from '../types/service.js';
import { Logger } from './log/Logger.js';
import { RenameService } from './rename/RenameService.js';
import { Matcher } from './rename/Matcher.js';
import { FsSafe } from './fs/FsSafe.js';
import { walkTree } from './fs/TreeWalker.js';
import { NullUndoLog, UndoLog } from './undo/UndoLog.js';
import { InternalError, hasErrorCode } from './errors/InternalError.js';
import { TypedEmitter } from '../utils/TypedEmitter.js';

export type { IConfig, RunOptions } from '../types/index.js';
export type { RunSummary, ServiceFileEvent } from '../types/service.js';

/**
 * Runs one normalisation pass over the given paths: walks them, computes canonical
 * names, asks (when interactive), renames and records undo entries.
 *
 * Emits typed events (`ServiceEventMap`) so the CLI can report without knowing the internals.
 */
export class NormalizeService {
  private emitter = new TypedEmitter<ServiceEventMap>();
  private logger: ILogger;
  private renamer: RenameService;
  private matcher: Matcher;
  private fsSafe: FsSafe;
  private undoLog: IUndoLog;
  private prompter: IPrompter | null;
  private summary: RunSummary = emptySummary();

  constructor(
    config: IConfig,
    private readonly options: RunOptions,
    deps: {
      logger?: ILogger;
      fsSafe?: FsSafe;
      undoLog?: IUndoLog;
      prompter?: IPrompter;
      now?: Date;
    } = {}
  ) {
    this.logger = deps.logger ?? new Logger();
    this.fsSafe = deps.fsSafe ?? new FsSafe();
    this.renamer = new RenameService(config, deps.now ?? new Date());
    this.matcher = new Matcher(config.exclude);
    this.undoLog = deps.undoLog ?? (config.undoLog && !options.dryRun ? new UndoLog(config.undoLog) : new NullUndoLog());
    this.prompter = options.interactive ? deps.prompter ?? null : null;
    if (options.interactive && !this.prompter) {
      throw new Error('interactive mode needs a prompter');
    }
  }

  /**
   * Subscribe to service events. Returns an unsubscribe handle for convenience.
   */
  on<K extends keyof ServiceEventMap>(event: K, listener: (event: ServiceEventMap[K]) => void): () => void {
    return this.emitter.on(event, listener);
  }

  private emit<K extends keyof ServiceEventMap>(event: K, payload: ServiceEventMap[K]) {
    this.emitter.emit(event, payload);
  }

  async run(paths: readonly string[]): Promise<RunSummary> {
    this.summary = emptySummary();
    for (const p of paths) {
      if (this.summary.aborted) break;
      await this.processRoot(path.resolve(p));
    }
    this.emit('summary', { ...this.summary });
    this.logger.debug?.('run finished', { ...this.summary });
    return { ...this.summary };
  }

  private async processRoot(root: string): Promise<void> {
    if (this.matcher.isExcluded(path.basename(root))) {
      this.skip(root, 'excluded');
      return;
    }
    try {
      for await (const entry of walkTree(root, { recursive: this.options.recursive, matcher: this.matcher })) {
        await this.processEntry(entry);
        if (this.summary.aborted) return;
      }
    } catch (err: unknown) {
      this.fail(root, describeFsError(err), err);
    }
  }

  private async processEntry(entry: WalkEntry): Promise<void> {
    const basename = path.basename(entry.path);
    let target: string;
    try {
      const assembled = this.renamer.targetFor(entry);
      if (!assembled.changed) {
        this.skip(entry.path, 'unchanged');
        return;
      }
      target = assembled.filename;
    } catch (err: unknown) {
      if (err instanceof InternalError) {
        this.fail(entry.path, `internal error: ${err.message}`, err);
        return;
      }
      throw err;
    }

    if (this.prompter) {
      const decision = await this.prompter.confirm(basename, target);
      if (decision.kind === 'quit') {
        this.summary.aborted = true;
        this.skip(entry.path, 'quit');
        return;
      }
      if (decision.kind === 'skip') {
        this.skip(entry.path, 'declined');
        return;
      }
      target = decision.target.trim();
      if (!target || target === basename) {
        this.skip(entry.path, 'unchanged');
        return;
      }
      if (target.includes('/') || target === '.' || target === '..') {
        this.fail(entry.path, `invalid name: ${target}`);
        return;
      }
    }

    const to = path.join(path.dirname(entry.path), target);
    if (this.options.dryRun) {
      this.summary.previewed++;
      this.emit('file', { kind: 'preview', file: entry.path, target: to, timestamp: Date.now() });
      this.logger.info('preview', { from: entry.path, to });
      return;
    }

    try {
      await this.fsSafe.rename(entry.path, to);
    } catch (err: unknown) {
      this.fail(entry.path, describeFsError(err), err);
      return;
    }

    this.summary.applied++;
    this.emit('file', { kind: 'applied', file: entry.path, target: to, timestamp: Date.now() });
    this.logger.info(`renamed ${entry.path} to ${to}`);

    try {
      await this.undoLog.record(entry.path, to);
    } catch (err: unknown) {
      this.fail(to, `renamed, but the undo log could not be written: ${describeFsError(err)}`, err);
    }
  }

  private skip(file: string, message: string) {
    this.summary.skipped++;
    this.emit('file', { kind: 'skipped', file, timestamp: Date.now(), message });
    this.logger.debug?.(`skipped ${file}: ${message}`);
  }

  private fail(file: string, message: string, cause?: unknown) {
    this.summary.failed++;
    this.emit('file', { kind: 'error', file, timestamp: Date.now(), message });
    this.logger.error(`${file}: ${message}`, cause instanceof Error ? { stack: cause.stack } : undefined);
  }
}

function emptySummary(): RunSummary {
  return { applied: 0, previewed: 0, skipped: 0, failed: 0, aborted: false };
}

function describeFsError(err: unknown): string {
  if (hasErrorCode(err, 'ENOENT')) return 'no such file or directory';
  if (hasErrorCode(err, 'EACCES', 'EPERM')) return 'permission denied';
  if (hasErrorCode(err, 'EEXIST', 'ENOTEMPTY')) return 'target exists';
  return err instanceof Error ? err.message : String(err);
}
