import { z } from 'zod';
import type { ShellCommandResult } from '../shell/session.js';
import { errorMessage } from '../utils/fs-errors.js';
import { createLogger } from '../utils/logger.js';
import { redactSecrets } from '../utils/secret-redaction.js';
import { toolError } from './errors.js';
import { createTool, type ToolResult } from './types.js';

const logger = createLogger('tools');

const BashParams = z.object({
	command: z.string().min(1),
	timeout: z.number().int().positive().optional(),
	description: z.string().optional(),
});

export const bashTool = createTool({
	name: 'Bash',
	description:
		'Run a command in a persistent bash session. Working directory, environment variables and shell state carry over between calls. stderr is merged into stdout.',
	parameters: BashParams,
	jsonSchema: {
		type: 'object',
		properties: {
			command: { type: 'string', description: 'Command line to run' },
			timeout: { type: 'integer', minimum: 1, description: 'Timeout in milliseconds' },
			description: { type: 'string', description: 'Short description shown to the operator' },
		},
		required: ['command'],
	},
	resource: (params) => params.command,
	async execute(params, context): Promise<ToolResult> {
		const timeoutMs = Math.min(params.timeout ?? context.timeouts.defaultMs, context.timeouts.maxMs);

		let result: ShellCommandResult;
		try {
			result = await context.shell.run(params.command, timeoutMs);
		} catch (err: unknown) {
			return toolError('execution', `Failed to run command: ${errorMessage(err)}`);
		}

		const metadata = {
			exitCode: result.exitCode,
			cwd: result.cwd,
			elapsedMs: result.elapsedMs,
			timedOut: result.timedOut,
			interrupted: result.interrupted === true,
		};
		const notes: string[] = [];

		if (result.timedOut) {
			logger.warn('Command timed out', { command: redactSecrets(params.command), timeoutMs });
			notes.push(`[command timed out after ${timeoutMs} ms; the shell was restarted in ${result.cwd}]`);
		} else if (result.interrupted) {
			notes.push(`[command interrupted; the shell was restarted in ${result.cwd}]`);
		} else if (result.exitCode === -1) {
			notes.push('[shell exited before the command finished; a new shell starts with the next command]');
		} else if (result.exitCode !== 0) {
			notes.push(`[exit code ${result.exitCode}]`);
		}

		const body = result.output.length > 0 ? result.output : notes.length === 0 ? '(no output)' : '';
		const content = [body, ...notes].filter((part) => part.length > 0).join('\n');

		if (result.timedOut) {
			return { content, isError: false, errorKind: 'timeout', timedOut: true, metadata };
		}
		return { content, isError: false, metadata };
	},
});
