import { describe, expect, it } from 'vitest';
import { formatDate, formatDateTime, isDateSource, resolveFallbackInstant } from './FallbackClock.js';

const ctime = new Date(2021, 0, 10);
const mtime = new Date(2020, 5, 1);
const now = new Date(2026, 9, 19);

describe('resolveFallbackInstant', () => {
	it('returns the earlier timestamp for earliest', () => {
		expect(resolveFallbackInstant('earliest', ctime, mtime, now)).toBe(mtime);
	});

	it('returns the later timestamp for latest', () => {
		expect(resolveFallbackInstant('latest', ctime, mtime, now)).toBe(ctime);
	});

	it('ignores the file for now', () => {
		expect(resolveFallbackInstant('now', ctime, mtime, now)).toBe(now);
	});
});

describe('formatting', () => {
	it('formats the local date', () => {
		expect(formatDate(new Date(2019, 6, 4, 23, 59))).toBe('2019-07-04');
	});

	it('formats the local date and time with dashes', () => {
		expect(formatDateTime(new Date(2019, 6, 4, 9, 8, 7))).toBe('2019-07-04T09-08-07');
	});
});

describe('isDateSource', () => {
	it('accepts only the known sources', () => {
		expect(isDateSource('latest')).toBe(true);
		expect(isDateSource('newest')).toBe(false);
		expect(isDateSource(1)).toBe(false);
	});
});
