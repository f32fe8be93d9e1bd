import fs from 'node:fs';
import fsp from 'node:fs/promises';
import path from 'node:path';
import type { ILogger, LogLevel } from '../../types/index.js';
import { logsDir } from '../../utils/paths.js';

const RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

export type LoggerOptions = {
	/** Most verbose level echoed to the console; the session file gets everything */
	level?: LogLevel;
	/** Append JSON lines to `session.log` in the logs directory */
	file?: boolean;
};

export class Logger implements ILogger {
	private stream: fs.WriteStream | null = null;
	private pending: string[] = [];
	private ring: string[] = [];
	private max = 500;
	private logFile: string | null = null;
	private fileFailed = false;
	private ready: Promise<void>;
	readonly level: LogLevel;

	constructor(opts: LoggerOptions = {}) {
		this.level = opts.level ?? 'warn';
		if (opts.file === false) {
			this.fileFailed = true;
			this.ready = Promise.resolve();
			return;
		}
		this.ready = this.init().catch((err: unknown) => this.disableFile(err));
	}

	private async init() {
		const dir = logsDir();
		await fsp.mkdir(dir, { recursive: true });
		this.logFile = path.join(dir, 'session.log');
		const stream = fs.createWriteStream(this.logFile, { flags: 'a', encoding: 'utf8' });
		stream.on('error', (err) => {
			if (this.stream === stream) this.disableFile(err);
		});
		this.stream = stream;
		for (const line of this.pending) stream.write(`${line}\n`);
		this.pending = [];
	}

	private disableFile(err: unknown) {
		this.fileFailed = true;
		this.stream = null;
		this.pending = [];
		this.echo('warn', `session log unavailable: ${err instanceof Error ? err.message : String(err)}`);
	}

	private pushRing(line: string) {
		this.ring.push(line);
		if (this.ring.length > this.max) this.ring.shift();
	}

	private write(level: LogLevel, msg: string, meta?: Record<string, unknown>) {
		const ts = new Date().toISOString();
		const rec = { ts, level, msg, ...(meta ? { meta } : {}) };
		const line = JSON.stringify(rec);
		this.pushRing(line);
		if (this.stream) this.stream.write(`${line}\n`);
		else if (!this.fileFailed) this.pending.push(line);
		if (RANK[level] <= RANK[this.level]) this.echo(level, msg);
	}

	// stdout is reserved for previews; the human-readable echo goes to stderr.
	private echo(level: LogLevel, msg: string) {
		process.stderr.write(`${level === 'info' ? '' : `${level}: `}${msg}\n`);
	}

	info(msg: string, meta?: Record<string, unknown>): void {
		this.write('info', msg, meta);
	}
	warn(msg: string, meta?: Record<string, unknown>): void {
		this.write('warn', msg, meta);
	}
	error(msg: string | Error, meta?: Record<string, unknown>): void {
		if (msg instanceof Error) this.write('error', msg.message, { stack: msg.stack, ...meta });
		else this.write('error', msg, meta);
	}
	debug(msg: string, meta?: Record<string, unknown>): void {
		this.write('debug', msg, meta);
	}

	getRing(): string[] {
		return [...this.ring];
	}

	get file(): string | null {
		return this.logFile;
	}

	async dispose(): Promise<void> {
		await this.ready;
		const stream = this.stream;
		if (!stream) return;
		this.stream = null;
		await new Promise<void>((resolve) => stream.end(resolve));
	}
}
