export type MonthNameTable = {
	/** Full English month names, index 0 = January */
	names: readonly string[];
	/** Three-letter abbreviations, index 0 = January */
	abbreviations: readonly string[];
};

const NAMES = [
	'January',
	'February',
	'March',
	'April',
	'May',
	'June',
	'July',
	'August',
	'September',
	'October',
	'November',
	'December',
] as const;

export function monthNameTable(): MonthNameTable {
	return {
		names: NAMES,
		abbreviations: NAMES.map((n) => n.slice(0, 3)),
	};
}

/**
 * Resolve a month name or abbreviation to its 1-based number.
 * Abbreviations are consulted first, then full names. Returns null when neither table knows the text.
 */
export function resolveMonthName(text: string, table: MonthNameTable): number | null {
	const needle = text.toLowerCase();
	const abbr = table.abbreviations.findIndex((a) => a.toLowerCase() === needle);
	if (abbr >= 0) return abbr + 1;
	const full = table.names.findIndex((n) => n.toLowerCase() === needle);
	if (full >= 0) return full + 1;
	return null;
}
