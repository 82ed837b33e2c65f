import { open, readFile, stat } from 'node:fs/promises';
import { extname } from 'node:path';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { fsError, toolError, toolSuccess } from './errors.js';
import { createTool } from './types.js';

const logger = createLogger('tools');

const BINARY_SNIFF_BYTES = 8_192;
const LINE_TRUNCATION_MARKER = '... [line truncated]';

const BINARY_EXTENSIONS = new Set([
	'.png', '.jpg', '.jpeg', '.gif', '.bmp', '.ico', '.webp', '.tiff', '.psd',
	'.mp3', '.wav', '.flac', '.ogg', '.mp4', '.mov', '.avi', '.mkv', '.webm',
	'.zip', '.gz', '.tgz', '.bz2', '.xz', '.7z', '.rar', '.tar',
	'.pdf', '.exe', '.dll', '.so', '.dylib', '.o', '.a', '.class', '.wasm',
	'.sqlite', '.db', '.bin', '.woff', '.woff2', '.ttf', '.otf',
]);

const ReadParams = z.object({
	file_path: z.string().min(1),
	offset: z.number().int().positive().optional(),
	limit: z.number().int().positive().optional(),
});

export function formatNumberedLine(lineNumber: number, line: string, maxLength: number): string {
	const text = line.length > maxLength ? `${line.slice(0, maxLength)}${LINE_TRUNCATION_MARKER}` : line;
	return `${String(lineNumber).padStart(6)}\t${text}`;
}

export function splitFileLines(text: string): string[] {
	const lines = text.split('\n');
	if (lines[lines.length - 1] === '') lines.pop();
	return lines;
}

async function readHead(path: string): Promise<Buffer> {
	const handle = await open(path, 'r');
	try {
		const buffer = Buffer.alloc(BINARY_SNIFF_BYTES);
		const { bytesRead } = await handle.read(buffer, 0, BINARY_SNIFF_BYTES, 0);
		return buffer.subarray(0, bytesRead);
	} finally {
		await handle.close();
	}
}

export const readTool = createTool({
	name: 'Read',
	description:
		'Read a text file. Returns numbered lines. Use offset and limit to page through large files. Files must be read before they can be edited or overwritten.',
	parameters: ReadParams,
	jsonSchema: {
		type: 'object',
		properties: {
			file_path: { type: 'string', description: 'Path to the file; relative paths resolve against the shell working directory' },
			offset: { type: 'integer', minimum: 1, description: '1-indexed line to start reading from' },
			limit: { type: 'integer', minimum: 1, description: 'Maximum number of lines to return' },
		},
		required: ['file_path'],
	},
	resource: (params) => params.file_path,
	async execute(params, context) {
		const path = context.resolvePath(params.file_path);

		let text: string;
		try {
			const info = await stat(path);
			if (info.isDirectory()) {
				return toolError('execution', `${path} is a directory, not a file. Use Bash with ls to list its contents.`);
			}
			if (BINARY_EXTENSIONS.has(extname(path).toLowerCase())) {
				return toolError(
					'execution',
					`${path} looks like a binary file (${extname(path)}). Use Bash with file or xxd to inspect it.`,
				);
			}
			if ((await readHead(path)).includes(0)) {
				return toolError('execution', `${path} contains binary data. Use Bash with file or xxd to inspect it.`);
			}
			text = await readFile(path, 'utf8');
		} catch (err: unknown) {
			return fsError('read', path, err);
		}

		if (text.length === 0) {
			context.ledger.recordRead(path, false);
			return toolSuccess('File is empty.', { path, totalLines: 0 });
		}

		const lines = splitFileLines(text);
		const offset = params.offset ?? 1;
		const limit = params.limit ?? context.files.defaultReadLimit;

		if (offset > lines.length) {
			context.ledger.recordRead(path, true);
			return toolSuccess(`File has ${lines.length} lines; offset ${offset} is past the end.`, {
				path,
				totalLines: lines.length,
			});
		}

		const window = lines.slice(offset - 1, offset - 1 + limit);
		const lastLine = offset - 1 + window.length;
		const partial = offset > 1 || lastLine < lines.length;
		context.ledger.recordRead(path, partial);
		logger.debug('File read', { path, offset, lines: window.length, partial });

		const body = window
			.map((line, index) => formatNumberedLine(offset + index, line, context.files.maxLineLength))
			.join('\n');
		const footer = partial ? `\n\n(showing lines ${offset}-${lastLine} of ${lines.length})` : '';

		return toolSuccess(`${body}${footer}`, { path, totalLines: lines.length, partial });
	},
});
