import { InternalError } from '../errors/InternalError.js';
import { buildDateTimePattern, type DateParts, type DateTimeMatch, type DateTimePattern } from './DateTimePattern.js';
import { formatDate, formatDateTime } from './FallbackClock.js';
import { monthNameTable, resolveMonthName, type MonthNameTable } from './MonthNames.js';
import { validYearSet } from './ValidYears.js';

export interface DateTimeConfig {
	readonly pattern: DateTimePattern;
	readonly months: MonthNameTable;
	readonly validYears: ReadonlySet<number>;
	readonly discardExistingName: boolean;
	readonly addTime: boolean;
	/** Called only when the name holds no date. */
	readonly fallbackInstant: () => Date;
}

export type DateTimeSettings = {
	now: Date;
	maxYearsBehind: number;
	maxYearsAhead: number;
	discardExistingName: boolean;
	addTime: boolean;
};

/**
 * Build the per-run pieces (year window, month tables, pattern) once.
 * The returned factory binds them to the fallback instant of a single file.
 */
export function createDateTimeConfig(settings: DateTimeSettings): (fallbackInstant: () => Date) => DateTimeConfig {
	const months = monthNameTable();
	const validYears = validYearSet(settings.now.getFullYear(), settings.maxYearsBehind, settings.maxYearsAhead);
	const pattern = buildDateTimePattern({ validYears, months });
	return (fallbackInstant) => ({
		pattern,
		months,
		validYears,
		discardExistingName: settings.discardExistingName,
		addTime: settings.addTime,
		fallbackInstant,
	});
}

/**
 * Move a date/time embedded in `name` to a canonical `YYYY-MM[-DD][THH[-MM[-SS]]]` prefix.
 * Names without a date get one from the fallback instant instead.
 *
 * @throws InternalError when the match breaks the pattern's own guarantees
 */
export function normalizeDateTimeInName(name: string, config: DateTimeConfig): string {
	const match = config.pattern.match(name);
	if (!match) return prefixWithFallback(name, config);

	if (match.prefix + match.boundary + match.block + match.suffix !== name) {
		throw new InternalError('date match does not cover the whole name', name);
	}

	let out = formatDateParts(match.date, config.months, name);
	if (match.time) {
		out += `T${match.time.hour}`;
		if (match.time.minute) out += `-${match.time.minute}`;
		if (match.time.second) out += `-${match.time.second}`;
	}
	if (!config.discardExistingName) {
		if (match.prefix) out += `-${match.prefix}`;
		out += joinSuffix(match);
	}
	return out;
}

function formatDateParts(date: DateParts, months: MonthNameTable, name: string): string {
	const month = pad2(resolveMonth(date.month, months, name));
	switch (date.layout) {
		case 'year-first':
			return date.day ? `${date.year}-${month}-${pad2(date.day)}` : `${date.year}-${month}`;
		case 'day-first':
			return `${date.year}-${month}-${pad2(date.day)}`;
		case 'month-name':
			return `${date.year}-${month}`;
	}
}

function resolveMonth(text: string, months: MonthNameTable, name: string): string {
	if (/^\d+$/.test(text)) return text;
	const n = resolveMonthName(text, months);
	if (n === null) throw new InternalError(`unrecognised month "${text}"`, name);
	return String(n);
}

function joinSuffix(match: DateTimeMatch): string {
	return match.suffix.startsWith('_') ? `-${match.suffix.slice(1)}` : match.suffix;
}

function prefixWithFallback(name: string, config: DateTimeConfig): string {
	const instant = config.fallbackInstant();
	const stamp = config.addTime ? formatDateTime(instant) : formatDate(instant);
	if (config.discardExistingName || name.trim().length === 0) return stamp;
	return `${stamp}-${name}`;
}

function pad2(s: string): string {
	return s.padStart(2, '0');
}
