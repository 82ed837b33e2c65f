import { chmod, mkdir, realpath, rename, rm, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { isMissingPathError } from '../utils/fs-errors.js';

async function existingMode(path: string): Promise<number | null> {
	try {
		return (await stat(path)).mode & 0o7777;
	} catch (err: unknown) {
		if (isMissingPathError(err)) return null;
		throw err;
	}
}

async function resolveTarget(path: string): Promise<string> {
	try {
		return await realpath(path);
	} catch (err: unknown) {
		if (isMissingPathError(err)) return path;
		throw err;
	}
}

/**
 * Replaces `path` with `content` through a temp file in the same directory
 * and a rename. A symlink is followed, so the file it points at is the one
 * replaced. Permission bits of an existing file carry over. Returns whether
 * the file existed before.
 */
export async function writeFileAtomic(path: string, content: string): Promise<{ created: boolean }> {
	const target = await resolveTarget(path);
	const mode = await existingMode(target);
	const directory = dirname(target);
	await mkdir(directory, { recursive: true });

	const tempPath = join(directory, `.${basename(target)}.${uuidv4()}.tmp`);
	try {
		await writeFile(tempPath, content, 'utf8');
		if (mode !== null) {
			await chmod(tempPath, mode);
		}
		await rename(tempPath, target);
	} catch (err: unknown) {
		await rm(tempPath, { force: true });
		throw err;
	}

	return { created: mode === null };
}
