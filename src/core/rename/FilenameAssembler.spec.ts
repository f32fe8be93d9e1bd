import { describe, expect, it } from 'vitest';
import { createDateTimeConfig } from '../datetime/DateTimeRewriter.js';
import { assembleFilename, splitName, type AssembleOptions } from './FilenameAssembler.js';

function options(overrides: Partial<AssembleOptions> = {}, discardExistingName = false): AssembleOptions {
	const dateTime = createDateTimeConfig({
		now: new Date(2026, 5, 1),
		maxYearsBehind: 30,
		maxYearsAhead: 5,
		discardExistingName,
		addTime: false,
	})(() => new Date(2019, 6, 4, 12, 0, 0));
	return { prefixDate: true, lowercaseExtension: true, isDirectory: false, dateTime, ...overrides };
}

describe('splitName', () => {
	it('splits on the last dot', () => {
		expect(splitName('archive.tar.gz')).toEqual({ name: 'archive.tar', ext: '.gz' });
	});

	it('does not treat a leading dot as an extension', () => {
		expect(splitName('.profile')).toEqual({ name: '.profile', ext: '' });
	});
});

describe('assembleFilename', () => {
	it('prefixes the date and lowercases the extension', () => {
		expect(assembleFilename('Report-2020-03-15.TXT', options())).toEqual({
			changed: true,
			filename: '2020-03-15-Report.txt',
			from: 'Report-2020-03-15.TXT',
		});
	});

	it('gives day-first and year-first names the same result', () => {
		expect(assembleFilename('15-03-2020-Report.txt', options()).filename).toBe('2020-03-15-Report.txt');
	});

	it('handles month-name dates', () => {
		expect(assembleFilename('March-2020-notes.txt', options()).filename).toBe('2020-03-notes.txt');
	});

	it('falls back to the file timestamp', () => {
		expect(assembleFilename('vacation.jpg', options()).filename).toBe('2019-07-04-vacation.jpg');
		expect(assembleFilename('vacation.jpg', options({}, true)).filename).toBe('2019-07-04.jpg');
	});

	it('trims whitespace left over around the name', () => {
		expect(assembleFilename('Screenshot 2024-01-05 at 14.22.09.png', options()).filename).toBe(
			'2024-01-05T14-22-09-Screenshot.png',
		);
	});

	it('keeps the extension case of directories', () => {
		expect(assembleFilename('Holiday 2021-05.Photos', options({ isDirectory: true })).filename).toBe(
			'2021-05-Holiday.Photos',
		);
	});

	it('only lowercases the extension when date prefixing is off', () => {
		expect(assembleFilename('IMG_0001.JPG', options({ prefixDate: false })).filename).toBe('IMG_0001.jpg');
	});

	it('reports no change for names already in canonical form', () => {
		expect(assembleFilename('2020-03-15-Report.txt', options())).toEqual({
			changed: false,
			filename: '2020-03-15-Report.txt',
		});
		expect(assembleFilename('a.TXT', options({ prefixDate: false, lowercaseExtension: false })).changed).toBe(false);
	});
});
