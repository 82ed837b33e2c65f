import { resolve as resolvePath } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { createAuditStore, createInMemoryAuditStore } from '../audit/audit-store.js';
import type { AuditStore } from '../audit/types.js';
import { expandHome } from '../config/defaults.js';
import { ConfigSchema, type TollgateConfig } from '../config/schema.js';
import { createFileAccessLedger, type FileAccessLedger } from '../ledger/file-ledger.js';
import { createToolMediator, type ToolMediator } from '../mediator/mediator.js';
import { createPermissionGate, type PermissionGate, type PermissionRequestListener } from '../permissions/gate.js';
import type { PermissionMode } from '../permissions/modes.js';
import { createShellSession, type ShellSession } from '../shell/session.js';
import { getBuiltinTools } from '../tools/index.js';
import type { ToolContext, ToolResult } from '../tools/types.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface AgentSessionOptions {
	config?: TollgateConfig;
	agentId?: string;
	/** Overrides `permissions.defaultMode` */
	mode?: PermissionMode;
	/** Overrides `shell.cwd` */
	cwd?: string;
	/** Overrides the store `audit` config would open */
	audit?: AuditStore;
	/** Extra environment for the shell */
	env?: Record<string, string>;
	/** Called when a turn is interrupted, to stop the host's in-flight work */
	onInterrupt?: () => void;
	onPermissionRequest?: PermissionRequestListener;
}

export interface Turn {
	id: string;
	signal: AbortSignal;
}

export interface AgentToolCall {
	name: string;
	input: unknown;
}

export interface AgentSession {
	readonly agentId: string;
	readonly shell: ShellSession;
	readonly ledger: FileAccessLedger;
	readonly gate: PermissionGate;
	readonly mediator: ToolMediator;
	readonly audit: AuditStore;
	/** Starts a new turn; the previous one, if still open, is superseded. */
	beginTurn(): Turn;
	getCurrentTurn(): Turn | null;
	/** Aborts the current turn and stops its running shell command. Returns false when no turn was running. */
	interrupt(): boolean;
	/** False for messages that belong to an interrupted turn. */
	acceptsMessage(turnId: string): boolean;
	handleToolCall(call: AgentToolCall): Promise<ToolResult>;
	/** Registers a read the host did itself, outside the Read tool. */
	noteExternalRead(path: string, partial?: boolean): void;
	close(): Promise<void>;
}

/**
 * One agent's tool-execution state: its shell, file ledger, permission gate,
 * mediator and audit log, plus turn control for the host loop.
 */
export function createAgentSession(options: AgentSessionOptions = {}): AgentSession {
	const config = options.config ?? ConfigSchema.parse({});
	const agentId = options.agentId ?? config.agent.id ?? 'agent';
	const logger = createLogger('session', { agentId });

	const shell = createShellSession({
		cwd: options.cwd ?? (config.shell.cwd ? expandHome(config.shell.cwd) : undefined),
		env: options.env,
		shell: config.shell.shell,
		defaultTimeoutMs: config.shell.defaultTimeoutMs,
		outputLimit: config.shell.outputLimit,
		killGraceMs: config.shell.killGraceMs,
		closeTimeoutMs: config.shell.closeTimeoutMs,
		stripEnvPrefixes: config.shell.stripEnvPrefixes,
	});
	const resolveToolPath = (filePath: string): string => resolvePath(shell.getCwd(), expandHome(filePath));
	const ledger = createFileAccessLedger(() => shell.getCwd());
	const gate = createPermissionGate({
		mode: options.mode ?? config.permissions.defaultMode,
		newFilePreviewLines: config.files.newFilePreviewLines,
		resolvePath: resolveToolPath,
	});
	if (options.onPermissionRequest) {
		gate.setRequestListener(options.onPermissionRequest);
	}

	const audit =
		options.audit ??
		(config.audit.enabled ? createAuditStore(expandHome(config.audit.dbPath)) : createInMemoryAuditStore());

	const context: ToolContext = {
		shell,
		ledger,
		files: config.files,
		timeouts: { defaultMs: config.shell.defaultTimeoutMs, maxMs: config.shell.maxTimeoutMs },
		resolvePath: resolveToolPath,
	};
	const mediator = createToolMediator({
		tools: getBuiltinTools(),
		gate,
		context,
		audit,
		defaultRequester: agentId,
	});

	let current: { turn: Turn; controller: AbortController; log: Logger } | null = null;
	const interrupted = new Set<string>();
	let closed = false;

	function beginTurn(): Turn {
		const controller = new AbortController();
		const turn: Turn = { id: uuidv4(), signal: controller.signal };
		current = { turn, controller, log: logger.child({ turnId: turn.id }) };
		current.log.debug('Turn started');
		return turn;
	}

	function interrupt(): boolean {
		if (!current || current.controller.signal.aborted) {
			return false;
		}
		const { turn, controller, log } = current;
		interrupted.add(turn.id);
		controller.abort();
		gate.cancelPending();
		const stoppedCommand = shell.interrupt();
		log.info('Turn interrupted', { stoppedCommand });
		options.onInterrupt?.();
		return true;
	}

	async function handleToolCall(call: AgentToolCall): Promise<ToolResult> {
		if (closed) {
			return { content: 'Session is closed', isError: true, errorKind: 'execution' };
		}
		return mediator.handle(
			{ name: call.name, input: call.input, requestedBy: agentId },
			{ signal: current?.turn.signal },
		);
	}

	async function close(): Promise<void> {
		if (closed) return;
		closed = true;
		current?.controller.abort();
		gate.cancelPending();
		await shell.close();
		audit.close();
		logger.info('Session closed');
	}

	return {
		agentId,
		shell,
		ledger,
		gate,
		mediator,
		audit,
		beginTurn,
		getCurrentTurn: () => current?.turn ?? null,
		interrupt,
		acceptsMessage: (turnId) => !interrupted.has(turnId),
		handleToolCall,
		noteExternalRead: (path, partial = false) => ledger.recordRead(resolveToolPath(path), partial),
		close,
	};
}
