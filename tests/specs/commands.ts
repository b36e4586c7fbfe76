import { testSuite, expect } from 'manten';
import { bold } from 'kolorist';
import { describeConfig } from '../../src/commands/config.js';
import { lookupMessage } from '../../src/commands/message.js';
import { Config } from '../../src/utils/config.js';
import { Resources } from '../../src/utils/resources.js';
import { KnownError, MissingSectionError } from '../../src/utils/error.js';
import { createFixture, lines } from '../utils.js';

export default testSuite(({ describe }) => {
	describe('commands', ({ test }) => {
		test('config prints a value, a section or the whole file', async () => {
			const { fixture, file } = await createFixture({
				'app.ini': lines('[db]', 'name = main', 'port = 5432', '[cache]', 'size = 10'),
			});
			const config = new Config(file('app.ini'));

			expect(describeConfig(config, 'db', 'port')).toEqual(['5432']);
			expect(describeConfig(config, 'db')).toEqual(['name=main', 'port=5432']);
			expect(describeConfig(config)).toEqual([
				bold('[db]'),
				'name=main',
				'port=5432',
				bold('[cache]'),
				'size=10',
			]);
			expect(() => describeConfig(config, 'absent')).toThrow(MissingSectionError);

			await fixture.rm();
		});

		test('message looks up messages and error codes', async () => {
			const { fixture } = await createFixture({
				'inikit_resources_english.ini': lines(
					'[messages]',
					'done = All done.',
					'[error_codes]',
					'101 = Cannot open {path}.'
				),
			});
			const resources = new Resources(fixture.path, 'inikit');

			expect(lookupMessage(resources, 'done', false)).toBe('All done.');
			expect(lookupMessage(resources, '101', true)).toBe('101: Cannot open {path}.');
			expect(() => lookupMessage(resources, 'abc', true)).toThrow(KnownError);

			await fixture.rm();
		});
	});
});
