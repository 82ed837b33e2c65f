import { createInterface } from 'node:readline/promises';
import { isPermissionMode, PERMISSION_MODES } from '../permissions/modes.js';
import type { AgentSession } from '../session/agent-session.js';
import type { ToolResult } from '../tools/types.js';
import { createTerminalConfirmer } from './prompt.js';
import type { Renderer } from './render.js';

export type ReplInput =
	| { kind: 'empty' }
	| { kind: 'quit' }
	| { kind: 'help' }
	| { kind: 'mode'; mode: string | null }
	| { kind: 'restart' }
	| { kind: 'usage' }
	| { kind: 'read'; path: string }
	| { kind: 'invalid'; message: string }
	| { kind: 'bash'; command: string };

export interface ReplOptions {
	input: NodeJS.ReadableStream;
	output: NodeJS.WritableStream;
	renderer: Renderer;
	terminal?: boolean;
}

const HELP = [
	'Each line runs as a Bash tool call. Commands:',
	'  :read <path>   read a file through the Read tool',
	`  :mode [name]   cycle or set the permission mode (${PERMISSION_MODES.join(', ')})`,
	'  :restart       restart the shell',
	'  :usage         tool calls so far',
	'  :quit          leave',
].join('\n');

export function parseReplLine(line: string): ReplInput {
	const trimmed = line.trim();
	if (trimmed.length === 0) return { kind: 'empty' };
	if (!trimmed.startsWith(':')) return { kind: 'bash', command: line };

	const [name = '', ...rest] = trimmed.slice(1).split(/\s+/);
	const argument = rest.join(' ');
	switch (name) {
		case 'q':
		case 'quit':
		case 'exit':
			return { kind: 'quit' };
		case 'help':
			return { kind: 'help' };
		case 'mode':
			return { kind: 'mode', mode: argument || null };
		case 'restart':
			return { kind: 'restart' };
		case 'usage':
			return { kind: 'usage' };
		case 'read':
			return argument ? { kind: 'read', path: argument } : { kind: 'invalid', message: 'Usage: :read <path>' };
		default:
			return { kind: 'invalid', message: `Unknown command :${name}. Type :help for the list.` };
	}
}

function withNewline(text: string): string {
	return text.endsWith('\n') ? text : `${text}\n`;
}

/**
 * Line-oriented front end: every line is a Bash call on the session, with
 * confirmations asked on the same terminal. Ctrl-C interrupts the running
 * call; on an idle prompt it leaves.
 */
export async function runShellRepl(session: AgentSession, options: ReplOptions): Promise<void> {
	const { renderer } = options;
	const rl = createInterface({ input: options.input, output: options.output, terminal: options.terminal ?? false });
	const write = (text: string): void => {
		options.output.write(text);
	};
	const confirmer = createTerminalConfirmer(rl, renderer, write);
	session.gate.setRequestListener(confirmer.listener);

	let running = false;
	rl.on('SIGINT', () => {
		if (running) {
			confirmer.cancel();
			session.interrupt();
			write('\n^C interrupted\n');
			return;
		}
		rl.close();
	});

	async function callTool(name: string, input: Record<string, unknown>): Promise<ToolResult> {
		session.beginTurn();
		return session.handleToolCall({ name, input });
	}

	async function dispatch(input: ReplInput): Promise<void> {
		switch (input.kind) {
			case 'empty':
			case 'quit':
				return;
			case 'help':
				write(withNewline(HELP));
				return;
			case 'mode': {
				if (input.mode === null) {
					session.gate.cycleMode();
				} else if (isPermissionMode(input.mode)) {
					session.gate.setMode(input.mode);
				} else {
					write(`Unknown mode "${input.mode}". Modes: ${PERMISSION_MODES.join(', ')}\n`);
					return;
				}
				write(withNewline(renderer.mode(session.gate.getMode())));
				return;
			}
			case 'restart':
				await session.shell.restart();
				write(`shell restarted in ${session.shell.getCwd()}\n`);
				return;
			case 'usage':
				write(withNewline(renderer.usage(session.audit.summarize())));
				return;
			case 'read':
				write(withNewline(renderer.result(await callTool('Read', { file_path: input.path }))));
				return;
			case 'invalid':
				write(withNewline(input.message));
				return;
			case 'bash':
				write(withNewline(renderer.result(await callTool('Bash', { command: input.command }))));
				return;
		}
	}

	const showPrompt = (): void => {
		rl.setPrompt(`${session.shell.getCwd()} [${session.gate.getMode()}] $ `);
		rl.prompt();
	};

	write(`${renderer.mode(session.gate.getMode())}. Type :help for commands.\n`);
	showPrompt();
	for await (const line of rl) {
		const input = parseReplLine(line);
		if (input.kind === 'quit') break;
		running = true;
		try {
			await dispatch(input);
		} finally {
			running = false;
		}
		showPrompt();
	}
	rl.close();
}
