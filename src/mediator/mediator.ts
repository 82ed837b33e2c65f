import { v4 as uuidv4 } from 'uuid';
import type { AuditDecision, AuditStore } from '../audit/types.js';
import type { PermissionGate } from '../permissions/gate.js';
import { ledgerError, toolError } from '../tools/errors.js';
import type { Tool, ToolContext, ToolDefinition, ToolResult } from '../tools/types.js';
import { errorMessage } from '../utils/fs-errors.js';
import { createLogger } from '../utils/logger.js';
import { redactSecrets, redactSecretsInRecord } from '../utils/secret-redaction.js';

const logger = createLogger('mediator');

export interface ToolRequest {
	name: string;
	input: unknown;
	/** Agent identity recorded in the audit log */
	requestedBy?: string;
}

export interface HandleOptions {
	/** Aborted when the turn that issued the call is interrupted */
	signal?: AbortSignal;
}

export interface ToolMediatorOptions {
	tools: Tool[];
	gate: PermissionGate;
	context: ToolContext;
	audit?: AuditStore | null;
	defaultRequester?: string;
}

export interface ToolMediator {
	handle(request: ToolRequest, options?: HandleOptions): Promise<ToolResult>;
	getDefinitions(): ToolDefinition[];
	getToolNames(): string[];
}

interface Outcome {
	result: ToolResult;
	decision: AuditDecision;
	resource: string;
	params: Record<string, unknown> | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const INTERRUPTED = 'Tool call refused: the turn that issued it was interrupted';

/**
 * Runs every agent tool call through the same sequence: validate the input,
 * check the file ledger for mutations, ask the permission gate, execute,
 * then record the call in the audit log. Failures at any step come back as
 * error results, never as exceptions.
 */
export function createToolMediator(options: ToolMediatorOptions): ToolMediator {
	const tools = new Map(options.tools.map((tool) => [tool.name, tool]));
	const { gate, context } = options;
	const audit = options.audit ?? null;
	const defaultRequester = options.defaultRequester ?? 'agent';

	async function mediate(request: ToolRequest, signal: AbortSignal | undefined): Promise<Outcome> {
		const rawParams = isRecord(request.input) ? request.input : undefined;
		const fallbackResource = typeof rawParams?.file_path === 'string'
			? rawParams.file_path
			: typeof rawParams?.command === 'string'
				? rawParams.command
				: '';
		const refuse = (result: ToolResult, decision: AuditDecision = 'not-evaluated'): Outcome => ({
			result,
			decision,
			resource: fallbackResource,
			params: rawParams,
		});

		if (signal?.aborted) {
			return refuse(toolError('safety', INTERRUPTED), 'cancelled');
		}

		const tool = tools.get(request.name);
		if (!tool) {
			const known = [...tools.keys()].join(', ');
			return refuse(toolError('validation', `Unknown tool: ${request.name}. Available tools: ${known}`));
		}

		const prepared = tool.prepare(request.input);
		if (!prepared.ok) {
			return refuse(toolError('validation', prepared.error));
		}
		const { call } = prepared;
		const settle = (result: ToolResult, decision: AuditDecision): Outcome => ({
			result,
			decision,
			resource: call.resource,
			params: call.input,
		});

		// Mutations of files that were never read, or changed since, fail
		// before the operator is asked about them.
		if (call.mutatesPath !== null) {
			const ledgerCheck = context.ledger.check(context.resolvePath(call.mutatesPath));
			if (!ledgerCheck.ok) {
				return settle(ledgerError(ledgerCheck), 'not-evaluated');
			}
		}

		const permission = await gate.evaluate(call.toolName, call.input, { signal });
		if (!permission.allowed) {
			const denial = toolError('safety', permission.reason, permission.final);
			return settle(permission.guardrail ? { ...denial, guardrail: true } : denial, permission.level);
		}

		if (signal?.aborted) {
			return settle(toolError('safety', INTERRUPTED), 'cancelled');
		}

		try {
			return settle(await call.execute(context), permission.level);
		} catch (err: unknown) {
			logger.error('Tool execution threw', { tool: call.toolName, error: errorMessage(err) });
			return settle(toolError('execution', `${call.toolName} failed: ${errorMessage(err)}`), permission.level);
		}
	}

	async function handle(request: ToolRequest, handleOptions: HandleOptions = {}): Promise<ToolResult> {
		const startedAt = new Date();
		const start = performance.now();
		const requestedBy = request.requestedBy ?? defaultRequester;

		const outcome = await mediate(request, handleOptions.signal);
		const { result } = outcome;
		const durationMs = Math.round(performance.now() - start);

		const denied = result.errorKind === 'safety';
		const level = result.isError ? (denied ? 'warn' : 'info') : 'debug';
		logger[level]('Tool call finished', {
			tool: request.name,
			resource: redactSecrets(outcome.resource),
			decision: outcome.decision,
			errorKind: result.errorKind,
			durationMs,
		});

		try {
			audit?.log({
				id: uuidv4(),
				timestamp: startedAt,
				tool: request.name,
				resource: redactSecrets(outcome.resource),
				params: outcome.params ? redactSecretsInRecord(outcome.params) : undefined,
				decision: outcome.decision,
				result: denied ? 'denied' : result.isError ? 'error' : 'success',
				errorKind: result.errorKind,
				output: redactSecrets(result.content),
				durationMs,
				requestedBy,
			});
		} catch (err: unknown) {
			logger.warn('Audit log write failed', { tool: request.name, error: errorMessage(err) });
		}

		return result;
	}

	return {
		handle,
		getDefinitions: () => [...tools.values()].map((tool) => tool.getDefinition()),
		getToolNames: () => [...tools.keys()],
	};
}
