/**
 * Years plausible enough to be read out of a filename: the half-open range
 * `[nowYear - maxYearsBehind, nowYear + maxYearsAhead)`.
 */
export function validYearSet(nowYear: number, maxYearsBehind: number, maxYearsAhead: number): Set<number> {
	const years = new Set<number>();
	for (let y = nowYear - maxYearsBehind; y < nowYear + maxYearsAhead; y++) {
		if (y >= 1000 && y <= 9999) years.add(y);
	}
	return years;
}
