export type DateSource = 'now' | 'earliest' | 'latest';

export const DATE_SOURCES: readonly DateSource[] = ['now', 'earliest', 'latest'];

export function isDateSource(v: unknown): v is DateSource {
	return typeof v === 'string' && (DATE_SOURCES as readonly string[]).includes(v);
}

/**
 * Pick the instant used to prefix a name that carries no date of its own.
 */
export function resolveFallbackInstant(policy: DateSource, ctime: Date, mtime: Date, now: Date = new Date()): Date {
	switch (policy) {
		case 'now':
			return now;
		case 'earliest':
			return ctime.getTime() <= mtime.getTime() ? ctime : mtime;
		case 'latest':
			return ctime.getTime() >= mtime.getTime() ? ctime : mtime;
	}
}

function pad2(n: number): string {
	return String(n).padStart(2, '0');
}

/** Local calendar date, `YYYY-MM-DD`. */
export function formatDate(d: Date): string {
	return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}`;
}

/** Local date and time, `YYYY-MM-DDTHH-MM-SS`. */
export function formatDateTime(d: Date): string {
	return `${formatDate(d)}T${pad2(d.getHours())}-${pad2(d.getMinutes())}-${pad2(d.getSeconds())}`;
}
