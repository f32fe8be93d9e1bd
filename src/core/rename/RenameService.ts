import path from 'node:path';
import type { IConfig, WalkEntry } from '../../types/index.js';
import { createDateTimeConfig, type DateTimeConfig } from '../datetime/DateTimeRewriter.js';
import { resolveFallbackInstant } from '../datetime/FallbackClock.js';
import { assembleFilename, splitName, type AssembledName } from './FilenameAssembler.js';

/**
 * Computes the canonical basename for walk entries. The year window and date pattern
 * are fixed when the service is created, so one instance serves one run.
 */
export class RenameService {
	private readonly dateTimeFor: (fallbackInstant: () => Date) => DateTimeConfig;

	constructor(
		private readonly config: IConfig,
		private readonly now: Date = new Date(),
	) {
		this.dateTimeFor = createDateTimeConfig({
			now,
			maxYearsBehind: config.maxYearsBehind,
			maxYearsAhead: config.maxYearsAhead,
			discardExistingName: config.discardExistingName,
			addTime: config.addTime,
		});
	}

	targetFor(entry: WalkEntry): AssembledName {
		const { dateSource } = this.config;
		const basename = path.basename(entry.path);
		const dateTime = this.dateTimeFor(() => resolveFallbackInstant(dateSource, entry.ctime, entry.mtime, this.now));
		if (this.config.prefixDate && holdsImplausibleDate(basename, dateTime)) {
			return { changed: false, filename: basename };
		}
		return assembleFilename(basename, {
			prefixDate: this.config.prefixDate,
			lowercaseExtension: this.config.lowercaseExtension,
			isDirectory: entry.isDirectory,
			dateTime,
		});
	}
}

const FULL_DATE = /(?<!\d)(\d{4})[-_]\d{2}[-_]\d{2}(?!\d)/g;

/**
 * A name with no readable date but a full `YYYY-MM-DD` block whose year is outside the
 * window (`blah-2100-01-01`) is left alone rather than given a second date.
 */
export function holdsImplausibleDate(basename: string, dateTime: DateTimeConfig): boolean {
	if (dateTime.pattern.match(splitName(basename).name)) return false;
	for (const m of basename.matchAll(FULL_DATE)) {
		if (!dateTime.validYears.has(Number(m[1]))) return true;
	}
	return false;
}
