import type { Interface } from 'node:readline/promises';
import type { PermissionRequest, PermissionRequestListener } from '../permissions/gate.js';
import { errorMessage } from '../utils/fs-errors.js';
import { createLogger } from '../utils/logger.js';
import type { Renderer } from './render.js';

const logger = createLogger('cli');

export function isApproval(answer: string): boolean {
	return /^\s*y(es)?\s*$/i.test(answer);
}

export interface TerminalConfirmer {
	listener: PermissionRequestListener;
	/** Abandons a question still waiting for an answer. */
	cancel(): void;
}

/**
 * Answers permission requests by asking on the terminal. Anything but an
 * explicit yes denies.
 */
export function createTerminalConfirmer(
	rl: Interface,
	renderer: Renderer,
	write: (text: string) => void,
): TerminalConfirmer {
	let asking: AbortController | null = null;

	async function ask(request: PermissionRequest): Promise<boolean> {
		write(`\n${renderer.request(request)}\n`);
		const controller = new AbortController();
		asking = controller;
		try {
			return isApproval(await rl.question('Allow? [y/N] ', { signal: controller.signal }));
		} finally {
			if (asking === controller) asking = null;
		}
	}

	return {
		listener(request) {
			ask(request).then(
				(allowed) => request.resolve(allowed),
				(err: unknown) => {
					logger.warn('Confirmation prompt ended without an answer, denying', { error: errorMessage(err) });
					request.resolve(false);
				},
			);
		},
		cancel() {
			asking?.abort();
		},
	};
}

/** For runs without a terminal: every request is denied. */
export function createNonInteractiveConfirmer(write: (text: string) => void): PermissionRequestListener {
	return (request) => {
		write(`${request.toolName} needs confirmation but no terminal is attached; denied.\n`);
		request.resolve(false);
	};
}
