import { testSuite, expect } from 'manten';
import {
	escapeRegExp,
	formatMultiLine,
	kebabToCamel,
	mergeListsUnique,
	padNumber,
} from '../../src/utils/general.js';

export default testSuite(({ describe }) => {
	describe('general', ({ test }) => {
		test('merges lists keeping first occurrences', () => {
			expect(mergeListsUnique(['a', 'B'], ['b', 'c', 'a'])).toEqual([
				'a',
				'B',
				'b',
				'c',
			]);
		});

		test('merges lists case-insensitively', () => {
			expect(mergeListsUnique(['a', 'B'], ['b', 'c'], false)).toEqual([
				'a',
				'B',
				'c',
			]);
		});

		test('pads numbers', () => {
			expect(padNumber(7, 3)).toBe('007');
			expect(padNumber(-7, 3)).toBe('-007');
			expect(padNumber(1234, 2)).toBe('1234');
		});

		test('converts kebab-case to camelCase', () => {
			expect(kebabToCamel('dry-run')).toBe('dryRun');
			expect(kebabToCamel('no-color-output')).toBe('noColorOutput');
			expect(kebabToCamel('x')).toBe('x');
		});

		test('escapes regex characters', () => {
			expect(escapeRegExp('a.b*c')).toBe('a\\.b\\*c');
			expect(new RegExp(`^${escapeRegExp('(1+1)?')}$`).test('(1+1)?')).toBe(true);
		});

		test('formats one entry per line', () => {
			expect(formatMultiLine(['one', 'two'])).toBe('one\ntwo');
			expect(formatMultiLine([])).toBe('');
		});
	});
});
