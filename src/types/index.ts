// Shared types and interfaces

import type { DateSource } from '../core/datetime/FallbackClock.js';

export interface IDispose {
	dispose(): void | Promise<void>;
}

/**
 * Persistent defaults, read from `config.json` and overridden by command-line flags.
 */
export interface IConfig {
	/** Move an embedded date to a canonical prefix (or synthesise one) */
	prefixDate: boolean;
	/** Keep only the date prefix, dropping the rest of the name */
	discardExistingName: boolean;
	/** Add `THH-MM-SS` when the prefix comes from a file timestamp or the clock */
	addTime: boolean;
	/** Which instant to use for names without a date */
	dateSource: DateSource;
	lowercaseExtension: boolean;
	maxYearsBehind: number;
	maxYearsAhead: number;
	/** Extra exclusion globs, on top of the built-in ones */
	exclude: string[];
	/** Undo script location; null disables the undo log */
	undoLog: string | null;
}

/** Per-invocation switches that are never persisted. */
export type RunOptions = {
	recursive: boolean;
	interactive: boolean;
	dryRun: boolean;
};

export interface IConfigStore {
	get(): Promise<IConfig>;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface ILogger {
	info(msg: string, meta?: Record<string, unknown>): void;
	warn(msg: string, meta?: Record<string, unknown>): void;
	error(msg: string | Error, meta?: Record<string, unknown>): void;
	debug?(msg: string, meta?: Record<string, unknown>): void;
}

export interface IUndoLog {
	readonly location: string;
	record(from: string, to: string): Promise<void>;
}

export type PromptDecision = { kind: 'rename'; target: string } | { kind: 'skip' } | { kind: 'quit' };

export interface IPrompter extends IDispose {
	/** Ask whether `from` should become `proposed` (both basenames). */
	confirm(from: string, proposed: string): Promise<PromptDecision>;
}

export type WalkEntry = {
	path: string;
	isDirectory: boolean;
	ctime: Date;
	mtime: Date;
};
