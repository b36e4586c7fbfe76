import {
	readFileSync,
	readlinkSync,
	statSync,
	symlinkSync,
	unlinkSync,
	writeFileSync,
} from 'fs';
import path from 'path';
import { testSuite, expect } from 'manten';
import {
	ancestorContainsFile,
	convertUnixPathToOsPath,
	copyAndAddVersionNumber,
	copyFileDeduplicated,
	dirFilesKeyedBySize,
	fileExists,
	filesAreIdentical,
	invertDirList,
	isDirectory,
	isFile,
	listFilesRecursively,
	lockDir,
	md5ForFile,
	symlinksToRealPaths,
	unlockDir,
	verifiedCopyFile,
} from '../../src/utils/fs.js';
import { FileNotFoundError, KnownError } from '../../src/utils/error.js';
import { createFixture } from '../utils.js';

const helloMd5 = '5d41402abc4b2a76b9719d911017c592';

export default testSuite(({ describe }) => {
	describe('fs', ({ test }) => {
		test('a written file exists until it is deleted', async () => {
			const { fixture, file } = await createFixture();

			writeFileSync(file('note.txt'), 'hello');
			expect(fileExists(file('note.txt'))).toBe(true);
			expect(isFile(file('note.txt'))).toBe(true);
			expect(isDirectory(file('note.txt'))).toBe(false);

			unlinkSync(file('note.txt'));
			expect(fileExists(file('note.txt'))).toBe(false);
			expect(isFile(file('note.txt'))).toBe(false);
			expect(isDirectory(fixture.path)).toBe(true);

			await fixture.rm();
		});

		test('inverts a directory list', async () => {
			const { fixture } = await createFixture({
				alpha: { 'a.txt': 'a' },
				beta: { 'b.txt': 'b' },
				keep: { 'k.txt': 'k' },
				'file.txt': 'not a directory',
			});

			expect(invertDirList(fixture.path, ['keep']).sort()).toEqual(['alpha', 'beta']);
			expect(invertDirList(fixture.path, ['keep'], 'a')).toEqual(['alpha']);
			expect(invertDirList(fixture.path, [], /b|k/).sort()).toEqual(['beta', 'keep']);

			await fixture.rm();
		});

		test('converts unix paths', () => {
			expect(convertUnixPathToOsPath('/usr/local/bin')).toBe(
				path.join('usr', 'local', 'bin')
			);
		});

		test('resolves symlinks', async () => {
			const { fixture, file } = await createFixture({
				'target.txt': 'target',
			});
			symlinkSync(file('target.txt'), file('link.txt'));

			expect(symlinksToRealPaths([file('link.txt')])).toEqual(
				symlinksToRealPaths([file('target.txt')])
			);
			expect(symlinksToRealPaths([file('absent.txt')])).toEqual([file('absent.txt')]);

			await fixture.rm();
		});

		test('lists files recursively', async () => {
			const { fixture, file } = await createFixture({
				'a.txt': 'a',
				sub: {
					'b.txt': 'b',
					deeper: { 'c.txt': 'c' },
				},
			});

			expect(listFilesRecursively([fixture.path]).sort()).toEqual([
				file('a.txt'),
				file('sub', 'b.txt'),
				file('sub', 'deeper', 'c.txt'),
			]);
			expect(() => listFilesRecursively([file('absent')])).toThrow(FileNotFoundError);

			await fixture.rm();
		});

		test('hashes and compares files', async () => {
			const { fixture, file } = await createFixture({
				'hello.txt': 'hello',
				'copy.txt': 'hello',
				'abc.txt': 'abc',
				'abd.txt': 'abd',
			});

			expect(md5ForFile(file('hello.txt'))).toBe(helloMd5);
			expect(md5ForFile(file('hello.txt'), 2)).toBe(helloMd5);
			expect(filesAreIdentical(file('hello.txt'), file('copy.txt'))).toBe(true);
			expect(filesAreIdentical(file('abc.txt'), file('abd.txt'))).toBe(false);
			expect(filesAreIdentical(file('abc.txt'), file('hello.txt'))).toBe(false);
			expect(() => md5ForFile(file('absent.txt'))).toThrow(FileNotFoundError);

			await fixture.rm();
		});

		test('copies with verification', async () => {
			const { fixture, file } = await createFixture({
				'source.txt': 'payload',
				'taken.txt': 'other',
			});

			verifiedCopyFile(file('source.txt'), file('copy.txt'));
			expect(readFileSync(file('copy.txt'), 'utf8')).toBe('payload');
			expect(() => verifiedCopyFile(file('source.txt'), file('taken.txt'))).toThrow();
			expect(readFileSync(file('taken.txt'), 'utf8')).toBe('other');

			await fixture.rm();
		});

		test('groups files by size', async () => {
			const { fixture, file } = await createFixture({
				a: 'abc',
				b: 'xyz',
				c: 'hello',
			});

			const sizes = dirFilesKeyedBySize(fixture.path);
			expect(sizes.get(3)?.sort()).toEqual([file('a'), file('b')]);
			expect(sizes.get(5)).toEqual([file('c')]);
			expect(sizes.size).toBe(2);

			await fixture.rm();
		});

		test('adds version numbers to copies', async () => {
			const { fixture, file } = await createFixture({
				src: { 'plate.exr': 'pixels' },
				out: { '.keep': '' },
			});

			expect(copyAndAddVersionNumber(file('src', 'plate.exr'), file('out'))).toBe(
				file('out', 'plate.v0001.exr')
			);
			expect(copyAndAddVersionNumber(file('src', 'plate.exr'), file('out'))).toBe(
				file('out', 'plate.v0002.exr')
			);
			expect(
				copyAndAddVersionNumber(file('src', 'plate.exr'), file('out'), {
					destName: 'comp.exr',
					versionPrefix: 'r',
					digits: 2,
					verify: true,
				})
			).toBe(file('out', 'comp.r01.exr'));
			expect(readFileSync(file('out', 'comp.r01.exr'), 'utf8')).toBe('pixels');

			await fixture.rm();
		});

		test('stores identical content once', async () => {
			const { fixture, file } = await createFixture({
				in: {
					'a.exr': 'frame',
					'b.exr': 'frame',
					'c.exr': 'other',
				},
				data: { '.keep': '' },
				shots: { '.keep': '' },
			});
			const dataSizes = dirFilesKeyedBySize(file('data'));

			const first = copyFileDeduplicated(file('in', 'a.exr'), file('shots'), file('data'), dataSizes);
			expect(first).toBe(file('data', 'a.v0001.exr'));
			expect(readlinkSync(file('shots', 'a.exr'))).toBe(path.join('..', 'data', 'a.v0001.exr'));
			expect(readFileSync(file('shots', 'a.exr'), 'utf8')).toBe('frame');
			expect(statSync(first).mode & 0o777).toBe(0o644);

			const second = copyFileDeduplicated(file('in', 'b.exr'), file('shots'), file('data'), dataSizes);
			expect(second).toBe(first);
			expect(readlinkSync(file('shots', 'b.exr'))).toBe(path.join('..', 'data', 'a.v0001.exr'));

			const third = copyFileDeduplicated(file('in', 'c.exr'), file('shots'), file('data'), dataSizes);
			expect(third).toBe(file('data', 'c.v0001.exr'));

			expect(() =>
				copyFileDeduplicated(file('in', 'a.exr'), file('data'), file('data'), dataSizes)
			).toThrow(KnownError);

			await fixture.rm();
		});

		test('finds an ancestor holding a marker file', async () => {
			const marker = '.inikit-test-marker';
			const { fixture, file } = await createFixture({
				project: {
					[marker]: '',
					src: {
						lib: { 'index.ts': '' },
					},
				},
			});
			const start = file('project', 'src', 'lib');

			expect(ancestorContainsFile(start, marker)).toBe(file('project'));
			expect(ancestorContainsFile(start, [marker], 1)).toBe(undefined);
			expect(ancestorContainsFile(start, [marker], 2)).toBe(file('project'));
			expect(ancestorContainsFile(start, '.inikit-absent-marker')).toBe(undefined);

			await fixture.rm();
		});

		test('locks and unlocks a directory', async () => {
			const { fixture, file } = await createFixture({
				shared: { 'a.txt': 'a' },
			});

			lockDir(file('shared'));
			expect(statSync(file('shared')).mode & 0o777).toBe(0o555);

			unlockDir(file('shared'));
			expect(statSync(file('shared')).mode & 0o777).toBe(0o755);

			await fixture.rm();
		});
	});
});
