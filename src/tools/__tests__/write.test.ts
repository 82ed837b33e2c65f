import {
	chmodSync,
	lstatSync,
	mkdtempSync,
	readFileSync,
	readdirSync,
	rmSync,
	statSync,
	symlinkSync,
	writeFileSync,
} from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { writeTool } from '../write.js';
import { createTestContext } from './context.js';

let dir: string;

beforeEach(() => {
	dir = mkdtempSync(join(tmpdir(), 'tollgate-write-'));
});

afterEach(() => {
	rmSync(dir, { recursive: true, force: true });
});

describe('writeTool', () => {
	it('creates new files and their parent directories', async () => {
		const context = createTestContext(dir);
		const target = join(dir, 'src', 'nested', 'new.ts');

		const result = await writeTool.run({ file_path: 'src/nested/new.ts', content: 'one\ntwo\n' }, context);

		expect(result.content).toBe(`Created ${target} (2 lines)`);
		expect(readFileSync(target, 'utf8')).toBe('one\ntwo\n');
		expect(context.ledger.get(target)).toMatchObject({ partial: false });
	});

	it('refuses to overwrite a file that was not read', async () => {
		const target = join(dir, 'existing.txt');
		writeFileSync(target, 'original\n');

		const result = await writeTool.run({ file_path: target, content: 'clobbered\n' }, createTestContext(dir));

		expect(result.errorKind).toBe('concurrency');
		expect(readFileSync(target, 'utf8')).toBe('original\n');
	});

	it('writes through a symlink to the file it points at', async () => {
		const context = createTestContext(dir);
		const real = join(dir, 'real.txt');
		const link = join(dir, 'link.txt');
		writeFileSync(real, 'old\n');
		symlinkSync(real, link);
		context.ledger.recordRead(link, false);

		const result = await writeTool.run({ file_path: 'link.txt', content: 'new\n' }, context);

		expect(result.content).toBe(`Updated ${link} (1 lines)`);
		expect(readFileSync(real, 'utf8')).toBe('new\n');
		expect(lstatSync(link).isSymbolicLink()).toBe(true);
		expect(readdirSync(dir).sort()).toEqual(['link.txt', 'real.txt']);
	});

	it('overwrites a read file and keeps its mode', async () => {
		const target = join(dir, 'secret.env');
		writeFileSync(target, 'A=1\n');
		chmodSync(target, 0o600);
		const context = createTestContext(dir);
		context.ledger.recordRead(target, true);

		const result = await writeTool.run({ file_path: target, content: 'A=2\n' }, context);

		expect(result.content).toBe(`Updated ${target} (1 lines)`);
		expect(readFileSync(target, 'utf8')).toBe('A=2\n');
		expect(statSync(target).mode & 0o777).toBe(0o600);
		expect(context.ledger.get(target)?.partial).toBe(false);
		expect(readdirSync(dir)).toEqual(['secret.env']);
	});
});
