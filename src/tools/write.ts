import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { fsError, ledgerError, toolSuccess } from './errors.js';
import { writeFileAtomic } from './fs-write.js';
import { splitFileLines } from './read.js';
import { createTool } from './types.js';

const logger = createLogger('tools');

const WriteParams = z.object({
	file_path: z.string().min(1),
	content: z.string(),
});

export const writeTool = createTool({
	name: 'Write',
	description:
		'Create a file or replace its whole content. Overwriting an existing file requires reading it first. Parent directories are created.',
	parameters: WriteParams,
	jsonSchema: {
		type: 'object',
		properties: {
			file_path: { type: 'string', description: 'File to create or overwrite' },
			content: { type: 'string', description: 'Full content of the file' },
		},
		required: ['file_path', 'content'],
	},
	resource: (params) => params.file_path,
	mutatesPath: (params) => params.file_path,
	async execute(params, context) {
		const path = context.resolvePath(params.file_path);

		const ledgerCheck = context.ledger.check(path);
		if (!ledgerCheck.ok) {
			return ledgerError(ledgerCheck);
		}

		let created: boolean;
		try {
			({ created } = await writeFileAtomic(path, params.content));
		} catch (err: unknown) {
			return fsError('write', path, err);
		}
		context.ledger.recordWrite(path);

		const lines = splitFileLines(params.content).length;
		logger.info('File written', { path, created, lines });
		return toolSuccess(`${created ? 'Created' : 'Updated'} ${path} (${lines} lines)`, { path, created, lines });
	},
});
