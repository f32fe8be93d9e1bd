import type { MonthNameTable } from './MonthNames.js';

/**
 * Date components recognised in a filename, tagged by the layout that produced them.
 * Values are kept as the text found in the name; `month` may be a name or abbreviation.
 */
export type DateParts =
	| { layout: 'year-first'; year: string; month: string; day?: string }
	| { layout: 'day-first'; year: string; month: string; day: string }
	| { layout: 'month-name'; year: string; month: string };

export type DateLayout = DateParts['layout'];

export type TimeParts = { hour: string; minute?: string; second?: string };

export type DateTimeMatch = {
	/** Text before the date, without the single `-`/`_` that separated it */
	prefix: string;
	/** The `-`/`_` dropped between prefix and date, or '' */
	boundary: string;
	date: DateParts;
	time?: TimeParts;
	/** Exact text of the recognised date/time block */
	block: string;
	suffix: string;
};

export type DateTimePatternOptions = {
	validYears: ReadonlySet<number>;
	months: MonthNameTable;
};

type Scan<T> = { value: T; end: number };

const LAYOUT_ORDER: readonly DateLayout[] = ['year-first', 'day-first', 'month-name'];

const DATE_TIME_SEPARATORS = [' at ', ', ', '-', '_', 'T'] as const;

/**
 * Recognises an embedded date (and optional time) in an extension-stripped filename.
 *
 * The three layouts are independent scanners tried in a fixed order at every start
 * position, shortest prefix first. Each field scanner yields its alternatives in
 * preference order, so the first complete parse is the result.
 */
export class DateTimePattern {
	private readonly validYears: ReadonlySet<number>;
	private readonly monthWords: string[];
	private readonly layouts: Record<DateLayout, (input: string, pos: number) => Iterable<Scan<DateParts>>>;

	constructor(options: DateTimePatternOptions) {
		this.validYears = options.validYears;
		// Full names ahead of abbreviations: "March" must not stop at "Mar".
		const words = [...options.months.names, ...options.months.abbreviations];
		this.monthWords = Array.from(new Set(words.map((w) => w.toLowerCase())));
		this.layouts = {
			'year-first': (input, pos) => this.scanYearFirst(input, pos),
			'day-first': (input, pos) => this.scanDayFirst(input, pos),
			'month-name': (input, pos) => this.scanMonthNameYear(input, pos),
		};
	}

	/** Order `match` tries layouts at each position; exposed so the tie-break order can be checked. */
	get layoutOrder(): readonly DateLayout[] {
		return LAYOUT_ORDER;
	}

	/** Returns the single whole-name match, or null when the name holds no recognisable date. */
	match(input: string): DateTimeMatch | null {
		for (let start = 0; start <= input.length; start++) {
			const c = input.charAt(start);
			const candidates = c === '-' || c === '_' ? [start + 1, start] : [start];
			for (const at of candidates) {
				for (const layout of LAYOUT_ORDER) {
					const date = first(this.layouts[layout](input, at));
					if (!date) continue;
					const time = first(this.scanTime(input, date.end));
					const end = time ? time.end : date.end;
					return {
						prefix: input.slice(0, start),
						boundary: input.slice(start, at),
						date: date.value,
						...(time ? { time: time.value } : {}),
						block: input.slice(at, end),
						suffix: input.slice(end),
					};
				}
			}
		}
		return null;
	}

	/** Runs one layout scanner in isolation at `pos`; `match` never calls it, it exists to check layouts one by one. */
	matchLayoutAt(layout: DateLayout, input: string, pos = 0): DateParts | null {
		const hit = first(this.layouts[layout](input, pos));
		return hit ? hit.value : null;
	}

	private *scanYearFirst(input: string, pos: number): Generator<Scan<DateParts>> {
		for (const year of this.scanYear(input, pos)) {
			for (const s1 of scanDateSeparator(input, year.end)) {
				for (const month of this.scanMonth(input, s1.end)) {
					for (const s2 of scanDateSeparator(input, month.end)) {
						for (const day of scanDay(input, s2.end)) {
							yield {
								value: { layout: 'year-first', year: year.value, month: month.value, day: day.value },
								end: day.end,
							};
						}
					}
					yield { value: { layout: 'year-first', year: year.value, month: month.value }, end: month.end };
				}
			}
		}
	}

	private *scanDayFirst(input: string, pos: number): Generator<Scan<DateParts>> {
		for (const day of scanDay(input, pos)) {
			for (const s1 of scanDateSeparator(input, day.end)) {
				for (const month of this.scanMonth(input, s1.end)) {
					for (const s2 of scanDateSeparator(input, month.end)) {
						for (const year of this.scanYear(input, s2.end)) {
							yield {
								value: { layout: 'day-first', year: year.value, month: month.value, day: day.value },
								end: year.end,
							};
						}
					}
				}
			}
		}
	}

	private *scanMonthNameYear(input: string, pos: number): Generator<Scan<DateParts>> {
		for (const month of this.scanMonthWord(input, pos)) {
			for (const s1 of scanDateSeparator(input, month.end)) {
				for (const year of this.scanYear(input, s1.end)) {
					yield { value: { layout: 'month-name', year: year.value, month: month.value }, end: year.end };
				}
			}
		}
	}

	private *scanTime(input: string, pos: number): Generator<Scan<TimeParts>> {
		for (const sep of scanDateTimeSeparator(input, pos)) {
			for (const hour of scanNumber(input, sep.end, 0, 23)) {
				for (const s2 of scanDateSeparator(input, hour.end)) {
					for (const minute of scanNumber(input, s2.end, 0, 59)) {
						for (const s3 of scanDateSeparator(input, minute.end)) {
							for (const second of scanNumber(input, s3.end, 0, 59)) {
								yield {
									value: { hour: hour.value, minute: minute.value, second: second.value },
									end: second.end,
								};
							}
						}
						yield { value: { hour: hour.value, minute: minute.value }, end: minute.end };
					}
				}
				yield { value: { hour: hour.value }, end: hour.end };
			}
		}
	}

	private *scanYear(input: string, pos: number): Generator<Scan<string>> {
		const text = input.slice(pos, pos + 4);
		if (/^\d{4}$/.test(text) && this.validYears.has(Number(text))) {
			yield { value: text, end: pos + 4 };
		}
	}

	private *scanMonth(input: string, pos: number): Generator<Scan<string>> {
		yield* scanNumber(input, pos, 1, 12);
		yield* scanLoneDigit(input, pos);
		yield* this.scanMonthWord(input, pos);
	}

	private *scanMonthWord(input: string, pos: number): Generator<Scan<string>> {
		for (const word of this.monthWords) {
			const text = input.slice(pos, pos + word.length);
			if (text.length === word.length && text.toLowerCase() === word) {
				yield { value: text, end: pos + word.length };
			}
		}
	}
}

export function buildDateTimePattern(options: DateTimePatternOptions): DateTimePattern {
	return new DateTimePattern(options);
}

function first<T>(scans: Iterable<T>): T | undefined {
	for (const s of scans) return s;
	return undefined;
}

function isDigit(c: string): boolean {
	return c >= '0' && c <= '9' && c.length === 1;
}

function isSpace(c: string): boolean {
	return c.length === 1 && /\s/.test(c);
}

/** `-`, `_`, `.` or whitespace, else nothing. */
function* scanDateSeparator(input: string, pos: number): Generator<Scan<string>> {
	const c = input.charAt(pos);
	if (c === '-' || c === '_' || c === '.' || isSpace(c)) {
		yield { value: c, end: pos + 1 };
	}
	yield { value: '', end: pos };
}

function* scanDateTimeSeparator(input: string, pos: number): Generator<Scan<string>> {
	for (const sep of DATE_TIME_SEPARATORS) {
		if (input.startsWith(sep, pos)) yield { value: sep, end: pos + sep.length };
	}
	const c = input.charAt(pos);
	if (isSpace(c)) yield { value: c, end: pos + 1 };
}

/** Exactly two digits whose value lies in `[min, max]`. */
function* scanNumber(input: string, pos: number, min: number, max: number): Generator<Scan<string>> {
	const text = input.slice(pos, pos + 2);
	if (text.length === 2 && isDigit(text.charAt(0)) && isDigit(text.charAt(1))) {
		const n = Number(text);
		if (n >= min && n <= max) yield { value: text, end: pos + 2 };
	}
}

/** A single digit 1-9 that is not the start of a longer number. */
function* scanLoneDigit(input: string, pos: number): Generator<Scan<string>> {
	const c = input.charAt(pos);
	if (isDigit(c) && c !== '0' && !isDigit(input.charAt(pos + 1))) {
		yield { value: c, end: pos + 1 };
	}
}

function* scanDay(input: string, pos: number): Generator<Scan<string>> {
	yield* scanNumber(input, pos, 1, 31);
	yield* scanLoneDigit(input, pos);
}
