import { createInterface } from 'node:readline/promises';
import type { Command } from 'commander';
import { classifyCommand } from '../guardrails/classifier.js';
import type { AgentSession } from '../session/agent-session.js';
import { errorMessage } from '../utils/fs-errors.js';
import { createNonInteractiveConfirmer, createTerminalConfirmer } from './prompt.js';
import type { Renderer } from './render.js';
import { runShellRepl } from './repl.js';
import type { CommonOptions } from './runtime.js';

export interface CliIO {
	stdin: NodeJS.ReadableStream & { isTTY?: boolean };
	stdout: NodeJS.WritableStream;
	stderr: NodeJS.WritableStream;
}

export interface RegisterCommandOptions {
	io: CliIO;
	renderer: Renderer;
	openSession(options: CommonOptions): AgentSession;
}

function withCommonOptions(command: Command): Command {
	return command
		.option('-c, --config <path>', 'Path to config file')
		.option('-m, --mode <mode>', 'Permission mode: safe, default or yolo')
		.option('--cwd <dir>', 'Starting directory of the shell')
		.option('-v, --verbose', 'Log at debug level to stderr');
}

async function reportErrors(io: CliIO, run: () => Promise<void>): Promise<void> {
	try {
		await run();
	} catch (error: unknown) {
		io.stderr.write(`Error: ${errorMessage(error)}\n`);
		process.exitCode = 1;
	}
}

export function parseToolInput(raw: string): Record<string, unknown> {
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error: unknown) {
		throw new Error(`--input is not valid JSON: ${errorMessage(error)}`);
	}
	if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
		throw new Error('--input must be a JSON object');
	}
	return Object.fromEntries(Object.entries(parsed));
}

export function registerClassifyCommand(program: Command, options: RegisterCommandOptions): void {
	program
		.command('classify')
		.argument('<command...>', 'Shell command to classify')
		.allowUnknownOption()
		.description('Show the guardrail verdict for a command. Exit code 0: no rule, 1: confirm, 2: block')
		.action((parts: string[]) => {
			const command = parts.join(' ');
			const verdict = classifyCommand(command);
			options.io.stdout.write(`${options.renderer.verdict(command, verdict)}\n`);
			process.exitCode = verdict ? (verdict.tier === 'block' ? 2 : 1) : 0;
		});
}

export function registerExecCommand(program: Command, options: RegisterCommandOptions): void {
	withCommonOptions(
		program
			.command('exec')
			.argument('<tool>', 'Tool name: Read, Edit, Write or Bash')
			.requiredOption('-i, --input <json>', 'Tool input as a JSON object')
			.description('Run one mediated tool call'),
	).action(async (tool: string, commandOptions: CommonOptions & { input: string }) => {
		await reportErrors(options.io, async () => {
			const input = parseToolInput(commandOptions.input);
			const { io, renderer } = options;
			const session = options.openSession(commandOptions);
			const rl = io.stdin.isTTY ? createInterface({ input: io.stdin, output: io.stdout }) : null;
			const write = (text: string): void => {
				io.stdout.write(text);
			};
			session.gate.setRequestListener(
				rl ? createTerminalConfirmer(rl, renderer, write).listener : createNonInteractiveConfirmer(write),
			);

			try {
				session.beginTurn();
				const result = await session.handleToolCall({ name: tool, input });
				write(`${renderer.result(result)}\n`);
				if (result.isError) process.exitCode = 1;
			} finally {
				rl?.close();
				await session.close();
			}
		});
	});
}

export function registerShellCommand(program: Command, options: RegisterCommandOptions): void {
	withCommonOptions(program.command('shell').description('Start a line-oriented mediated shell')).action(
		async (commandOptions: CommonOptions) => {
			await reportErrors(options.io, async () => {
				const session = options.openSession(commandOptions);
				try {
					await runShellRepl(session, {
						input: options.io.stdin,
						output: options.io.stdout,
						renderer: options.renderer,
						terminal: Boolean(options.io.stdin.isTTY),
					});
				} finally {
					await session.close();
				}
			});
		},
	);
}
