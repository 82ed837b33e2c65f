import type { z } from 'zod';
import type { FilesConfig } from '../config/schema.js';
import type { FileAccessLedger } from '../ledger/file-ledger.js';
import type { ShellSession } from '../shell/session.js';

export const TOOL_ERROR_KINDS = ['validation', 'concurrency', 'safety', 'execution', 'timeout'] as const;

export type ToolErrorKind = (typeof TOOL_ERROR_KINDS)[number];

export interface ToolResult {
	content: string;
	isError: boolean;
	errorKind?: ToolErrorKind;
	/** Set on safety errors the agent cannot retry its way around */
	final?: boolean;
	/** Denied by the dangerous-command guardrail; front ends show these apart */
	guardrail?: boolean;
	timedOut?: boolean;
	metadata?: Record<string, unknown>;
}

export interface ToolContext {
	shell: ShellSession;
	ledger: FileAccessLedger;
	files: FilesConfig;
	timeouts: { defaultMs: number; maxMs: number };
	/** Resolves a tool path against the shell's tracked working directory */
	resolvePath(filePath: string): string;
}

export interface ToolDefinition {
	name: string;
	description: string;
	parameters: Record<string, unknown>;
}

/**
 * A validated call, ready to be gated and executed. The parameter type is
 * erased here so the mediator can hold calls to any tool.
 */
export interface PreparedCall {
	toolName: string;
	input: Record<string, unknown>;
	/** What the call touches: a path or a command line */
	resource: string;
	/** Existing files at this path must pass the ledger before the call runs */
	mutatesPath: string | null;
	execute(context: ToolContext): Promise<ToolResult>;
}

export type PrepareResult = { ok: true; call: PreparedCall } | { ok: false; error: string };

export interface Tool<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
	name: string;
	description: string;
	parameters: TSchema;
	jsonSchema: Record<string, unknown>;
	execute(params: z.infer<TSchema>, context: ToolContext): Promise<ToolResult>;
	prepare(rawParams: unknown): PrepareResult;
	run(rawParams: unknown, context: ToolContext): Promise<ToolResult>;
	getDefinition(): ToolDefinition;
}

interface CreateToolArgs<TSchema extends z.ZodTypeAny> {
	name: string;
	description: string;
	parameters: TSchema;
	jsonSchema: Record<string, unknown>;
	resource(params: z.infer<TSchema>): string;
	mutatesPath?(params: z.infer<TSchema>): string;
	execute(params: z.infer<TSchema>, context: ToolContext): Promise<ToolResult>;
}

export function formatZodIssues(issues: z.ZodIssue[]): string {
	return issues
		.map((issue) => {
			const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
			return `${path}: ${issue.message}`;
		})
		.join('; ');
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createTool<TSchema extends z.ZodTypeAny>(args: CreateToolArgs<TSchema>): Tool<TSchema> {
	function prepare(rawParams: unknown): PrepareResult {
		const parsed = args.parameters.safeParse(rawParams);
		if (!parsed.success) {
			return {
				ok: false,
				error: `Invalid ${args.name} parameters: ${formatZodIssues(parsed.error.issues)}`,
			};
		}
		const params: z.infer<TSchema> = parsed.data;
		return {
			ok: true,
			call: {
				toolName: args.name,
				input: isRecord(rawParams) ? rawParams : {},
				resource: args.resource(params),
				mutatesPath: args.mutatesPath ? args.mutatesPath(params) : null,
				execute: (context) => args.execute(params, context),
			},
		};
	}

	return {
		name: args.name,
		description: args.description,
		parameters: args.parameters,
		jsonSchema: args.jsonSchema,
		execute: args.execute,
		prepare,
		async run(rawParams: unknown, context: ToolContext): Promise<ToolResult> {
			const prepared = prepare(rawParams);
			if (!prepared.ok) {
				return { content: prepared.error, isError: true, errorKind: 'validation' };
			}
			return prepared.call.execute(context);
		},
		getDefinition(): ToolDefinition {
			return {
				name: args.name,
				description: args.description,
				parameters: args.jsonSchema,
			};
		},
	};
}
