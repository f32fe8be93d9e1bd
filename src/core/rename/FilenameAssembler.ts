import path from 'node:path';
import { normalizeDateTimeInName, type DateTimeConfig } from '../datetime/DateTimeRewriter.js';

export type AssembleOptions = {
	/** Rewrite the date/time into a prefix; when false only the extension is touched */
	prefixDate: boolean;
	lowercaseExtension: boolean;
	isDirectory: boolean;
	dateTime: DateTimeConfig;
};

export type AssembledName = { changed: false; filename: string } | { changed: true; filename: string; from: string };

/**
 * Split a basename into name and extension. A leading dot does not start an extension,
 * so `.profile` has none.
 */
export function splitName(basename: string): { name: string; ext: string } {
	const ext = path.extname(basename);
	return { name: ext ? basename.slice(0, -ext.length) : basename, ext };
}

export function assembleFilename(basename: string, opts: AssembleOptions): AssembledName {
	const { name, ext } = splitName(basename);
	const body = (opts.prefixDate ? normalizeDateTimeInName(name, opts.dateTime) : name).trim();
	if (!body) return { changed: false, filename: basename };
	const nextExt = opts.lowercaseExtension && !opts.isDirectory ? ext.toLowerCase() : ext;
	const filename = `${body}${nextExt}`;
	if (filename === basename) return { changed: false, filename };
	return { changed: true, filename, from: basename };
}
