import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { fsError, ledgerError, toolError, toolSuccess } from './errors.js';
import { writeFileAtomic } from './fs-write.js';
import { createTool } from './types.js';

const logger = createLogger('tools');

const EditParams = z.object({
	file_path: z.string().min(1),
	old_string: z.string().min(1),
	new_string: z.string(),
	replace_all: z.boolean().optional(),
});

export interface EditPlan {
	target: string;
	replacement: string;
}

/**
 * Trailing newlines on `old_string` are not part of the match. When
 * `new_string` ends with the same newlines they are dropped from it too, so
 * the edit neither eats nor duplicates line breaks at the end of the file.
 */
export function planEdit(oldString: string, newString: string): EditPlan {
	const target = oldString.replace(/\n+$/, '');
	const stripped = oldString.slice(target.length);
	const replacement =
		stripped.length > 0 && newString.endsWith(stripped) ? newString.slice(0, -stripped.length) : newString;
	return { target, replacement };
}

export function countOccurrences(haystack: string, needle: string): number {
	return haystack.split(needle).length - 1;
}

export const editTool = createTool({
	name: 'Edit',
	description:
		'Replace old_string with new_string in a file. The file must have been read first. old_string must match exactly once unless replace_all is set.',
	parameters: EditParams,
	jsonSchema: {
		type: 'object',
		properties: {
			file_path: { type: 'string', description: 'File to modify' },
			old_string: { type: 'string', description: 'Exact text to replace' },
			new_string: { type: 'string', description: 'Replacement text' },
			replace_all: { type: 'boolean', description: 'Replace every occurrence instead of exactly one' },
		},
		required: ['file_path', 'old_string', 'new_string'],
	},
	resource: (params) => params.file_path,
	mutatesPath: (params) => params.file_path,
	async execute(params, context) {
		const path = context.resolvePath(params.file_path);

		const ledgerCheck = context.ledger.check(path);
		if (!ledgerCheck.ok) {
			return ledgerError(ledgerCheck);
		}

		const { target, replacement } = planEdit(params.old_string, params.new_string);
		if (target.length === 0) {
			return toolError('validation', 'old_string must contain more than line breaks');
		}

		let original: string;
		try {
			original = await readFile(path, 'utf8');
		} catch (err: unknown) {
			return fsError('read', path, err);
		}

		const matches = countOccurrences(original, target);
		if (matches === 0) {
			return toolError('execution', `old_string not found in ${path}`);
		}
		if (matches > 1 && !params.replace_all) {
			return toolError(
				'execution',
				`Found ${matches} matches of old_string in ${path}. Set replace_all to replace every one, or include more surrounding context to match exactly one.`,
			);
		}

		const updated = params.replace_all
			? original.split(target).join(replacement)
			: original.replace(target, () => replacement);
		if (updated === original) {
			return toolError('execution', 'old_string and new_string match exactly, nothing to apply');
		}

		try {
			await writeFileAtomic(path, updated);
		} catch (err: unknown) {
			return fsError('write', path, err);
		}
		context.ledger.recordWrite(path);

		const replaced = params.replace_all ? matches : 1;
		logger.info('File edited', { path, replaced });
		return toolSuccess(`Edited ${path}: replaced ${replaced} occurrence${replaced === 1 ? '' : 's'}`, {
			path,
			replaced,
		});
	},
});
