import { resolve as resolvePath } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { type DangerClassification, classifyCommand } from '../guardrails/classifier.js';
import { createLogger } from '../utils/logger.js';
import { redactSecrets } from '../utils/secret-redaction.js';
import { type PermissionMode, needsPermission, nextMode } from './modes.js';
import { buildPreview } from './preview.js';

/** A pending operator decision. `resolve` takes effect once; later calls are ignored. */
export interface PermissionRequest {
	id: string;
	toolName: string;
	toolInput: Record<string, unknown>;
	previewText: string;
	danger: DangerClassification | null;
	readonly resolved: boolean;
	/** `null` until resolved. */
	readonly decision: boolean | null;
	resolve(allowed: boolean): void;
}

export type DenialLevel = 'blocked' | 'user-denied' | 'cancelled' | 'busy' | 'unavailable';

export type PermissionDecision =
	| { allowed: true; level: 'auto' | 'user-approved' }
	| {
			allowed: false;
			level: DenialLevel;
			reason: string;
			/** Denied by the command guardrail rather than by mode or operator. */
			guardrail: boolean;
			/** Retrying the same call can never succeed. */
			final: boolean;
	  };

export type PermissionRequestListener = (request: PermissionRequest) => void;

export interface EvaluateOptions {
	signal?: AbortSignal;
}

export interface PermissionGateOptions {
	mode: PermissionMode;
	newFilePreviewLines?: number;
	resolvePath?: (filePath: string) => string;
}

export interface PermissionGate {
	evaluate(
		toolName: string,
		toolInput: Record<string, unknown>,
		options?: EvaluateOptions,
	): Promise<PermissionDecision>;
	getMode(): PermissionMode;
	setMode(mode: PermissionMode): void;
	cycleMode(): PermissionMode;
	getPendingRequest(): PermissionRequest | null;
	/** Answers the pending request. Returns false when nothing was pending. */
	resolve(allowed: boolean): boolean;
	/** Denies the pending request as cancelled. Returns false when nothing was pending. */
	cancelPending(): boolean;
	setRequestListener(listener: PermissionRequestListener | null): void;
}

type Outcome = 'approved' | 'denied' | 'cancelled' | 'busy' | 'unavailable';

const logger = createLogger('permissions');

function denied(
	level: DenialLevel,
	reason: string,
	guardrail = false,
	final = false,
): PermissionDecision {
	return { allowed: false, level, reason, guardrail, final };
}

function outcomeDenial(outcome: Exclude<Outcome, 'approved'>, rejection: string, guardrail: boolean): PermissionDecision {
	switch (outcome) {
		case 'denied':
			return denied('user-denied', rejection, guardrail);
		case 'cancelled':
			return denied('cancelled', 'Tool call cancelled before a decision was made', guardrail);
		case 'busy':
			return denied('busy', 'Another confirmation is already pending', guardrail);
		case 'unavailable':
			return denied('unavailable', 'No confirmation handler available', guardrail);
	}
}

/**
 * Decides whether a tool call may run: guardrail tiers first, then the
 * session's permission mode, then the operator through a single
 * outstanding confirmation request.
 */
export function createPermissionGate(options: PermissionGateOptions): PermissionGate {
	let mode = options.mode;
	let pending: PermissionRequest | null = null;
	let cancelCurrent: (() => void) | null = null;
	let listener: PermissionRequestListener | null = null;

	const previewOptions = {
		resolvePath: options.resolvePath ?? ((filePath: string) => resolvePath(filePath)),
		newFilePreviewLines: options.newFilePreviewLines ?? 15,
	};

	async function confirm(
		toolName: string,
		toolInput: Record<string, unknown>,
		previewText: string,
		danger: DangerClassification | null,
		signal: AbortSignal | undefined,
	): Promise<Outcome> {
		if (signal?.aborted) return 'cancelled';
		if (pending) return 'busy';
		if (!listener) return 'unavailable';

		let settle: (outcome: Outcome) => void = () => undefined;
		const outcome = new Promise<Outcome>((resolve) => {
			settle = resolve;
		});

		let decision: boolean | null = null;
		let resolved = false;
		const finish = (result: Outcome, allowed: boolean): void => {
			if (resolved) return;
			resolved = true;
			decision = allowed;
			settle(result);
		};

		const request: PermissionRequest = {
			id: uuidv4(),
			toolName,
			toolInput,
			previewText,
			danger,
			get resolved() {
				return resolved;
			},
			get decision() {
				return decision;
			},
			resolve(allowed: boolean) {
				finish(allowed ? 'approved' : 'denied', allowed);
			},
		};

		const onAbort = (): void => finish('cancelled', false);
		signal?.addEventListener('abort', onAbort, { once: true });
		pending = request;
		cancelCurrent = onAbort;

		try {
			listener(request);
		} catch (err: unknown) {
			logger.error('Confirmation listener failed', {
				toolName,
				error: err instanceof Error ? err.message : String(err),
			});
			finish('denied', false);
		}

		try {
			return await outcome;
		} finally {
			signal?.removeEventListener('abort', onAbort);
			if (pending === request) {
				pending = null;
				cancelCurrent = null;
			}
		}
	}

	async function evaluate(
		toolName: string,
		toolInput: Record<string, unknown>,
		evaluateOptions: EvaluateOptions = {},
	): Promise<PermissionDecision> {
		const { signal } = evaluateOptions;

		if (toolName === 'Bash') {
			const command = typeof toolInput.command === 'string' ? toolInput.command : '';
			const danger = classifyCommand(command);

			if (danger?.tier === 'block') {
				logger.warn('Command blocked by guardrail', {
					command: redactSecrets(command),
					reason: danger.description,
				});
				return denied(
					'blocked',
					`Blocked by guardrail: ${danger.description}. This command is never allowed.`,
					true,
					true,
				);
			}

			if (danger) {
				const outcome = await confirm(
					toolName,
					toolInput,
					`DANGEROUS: ${danger.description}\n\n$ ${command}`,
					danger,
					signal,
				);
				if (outcome === 'approved') {
					logger.info('Dangerous command approved', { reason: danger.description });
					return { allowed: true, level: 'user-approved' };
				}
				logger.warn('Dangerous command not approved', { reason: danger.description, outcome });
				return outcomeDenial(outcome, `User rejected dangerous command: ${danger.description}`, true);
			}
		}

		if (!needsPermission(mode, toolName)) {
			return { allowed: true, level: 'auto' };
		}

		const previewText = await buildPreview(toolName, toolInput, previewOptions);
		const outcome = await confirm(toolName, toolInput, previewText, null, signal);
		if (outcome === 'approved') {
			return { allowed: true, level: 'user-approved' };
		}
		logger.info('Tool call not approved', { toolName, mode, outcome });
		return outcomeDenial(outcome, 'User rejected tool call', false);
	}

	return {
		evaluate,
		getMode: () => mode,
		setMode(next) {
			logger.info('Permission mode changed', { from: mode, to: next });
			mode = next;
		},
		cycleMode() {
			const next = nextMode(mode);
			logger.info('Permission mode changed', { from: mode, to: next });
			mode = next;
			return mode;
		},
		getPendingRequest: () => pending,
		resolve(allowed) {
			if (!pending) return false;
			pending.resolve(allowed);
			return true;
		},
		cancelPending() {
			if (!cancelCurrent) return false;
			cancelCurrent();
			return true;
		},
		setRequestListener(next) {
			listener = next;
		},
	};
}
