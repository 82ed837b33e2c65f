import { describe, expect, it, vi } from 'vitest';
import { createPermissionGate, type PermissionRequest } from '../gate.js';

function tick(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}

describe('createPermissionGate', () => {
	it('auto-allows what the mode does not gate', async () => {
		const gate = createPermissionGate({ mode: 'default' });
		const listener = vi.fn();
		gate.setRequestListener(listener);

		await expect(gate.evaluate('Read', { file_path: 'a.txt' })).resolves.toEqual({
			allowed: true,
			level: 'auto',
		});
		await expect(gate.evaluate('Bash', { command: 'ls -la' })).resolves.toEqual({
			allowed: true,
			level: 'auto',
		});
		expect(listener).not.toHaveBeenCalled();
	});

	it('lets yolo mode write without asking', async () => {
		const gate = createPermissionGate({ mode: 'yolo' });
		const listener = vi.fn();
		gate.setRequestListener(listener);

		const decision = await gate.evaluate('Write', { file_path: '/tmp/x', content: 'x' });

		expect(decision).toEqual({ allowed: true, level: 'auto' });
		expect(listener).not.toHaveBeenCalled();
	});

	it('asks in safe mode before running a command', async () => {
		const gate = createPermissionGate({ mode: 'safe' });
		const seen: PermissionRequest[] = [];
		gate.setRequestListener((request) => {
			seen.push(request);
			request.resolve(true);
		});

		const decision = await gate.evaluate('Bash', { command: 'make', description: 'Build' });

		expect(decision).toEqual({ allowed: true, level: 'user-approved' });
		expect(seen).toHaveLength(1);
		expect(seen[0]?.previewText).toBe('Build\n$ make');
		expect(seen[0]?.danger).toBeNull();
		expect(seen[0]?.resolved).toBe(true);
		expect(seen[0]?.decision).toBe(true);
		expect(gate.getPendingRequest()).toBeNull();
	});

	it('reports an operator rejection', async () => {
		const gate = createPermissionGate({ mode: 'safe' });
		gate.setRequestListener((request) => request.resolve(false));

		const decision = await gate.evaluate('Bash', { command: 'make' });

		expect(decision).toEqual({
			allowed: false,
			level: 'user-denied',
			reason: 'User rejected tool call',
			guardrail: false,
			final: false,
		});
	});

	it('blocks block-tier commands in every mode without asking', async () => {
		const gate = createPermissionGate({ mode: 'yolo' });
		const listener = vi.fn();
		gate.setRequestListener(listener);

		const decision = await gate.evaluate('Bash', { command: 'rm -rf /' });

		expect(decision).toEqual({
			allowed: false,
			level: 'blocked',
			reason: 'Blocked by guardrail: recursive delete from filesystem root. This command is never allowed.',
			guardrail: true,
			final: true,
		});
		expect(listener).not.toHaveBeenCalled();
	});

	it('still prompts for confirm-tier commands in yolo mode', async () => {
		const gate = createPermissionGate({ mode: 'yolo' });
		const seen: PermissionRequest[] = [];
		gate.setRequestListener((request) => {
			seen.push(request);
			request.resolve(false);
		});

		const decision = await gate.evaluate('Bash', { command: 'rm -rf build' });

		expect(seen).toHaveLength(1);
		expect(seen[0]?.previewText).toBe('DANGEROUS: recursive force delete (rm -rf)\n\n$ rm -rf build');
		expect(seen[0]?.danger).toEqual({ tier: 'confirm', description: 'recursive force delete (rm -rf)' });
		expect(decision).toEqual({
			allowed: false,
			level: 'user-denied',
			reason: 'User rejected dangerous command: recursive force delete (rm -rf)',
			guardrail: true,
			final: false,
		});
	});

	it('publishes the outstanding request and resolves it once', async () => {
		const gate = createPermissionGate({ mode: 'safe' });
		gate.setRequestListener(() => undefined);

		const pending = gate.evaluate('Bash', { command: 'make' });
		await tick();

		const request = gate.getPendingRequest();
		expect(request?.toolName).toBe('Bash');
		expect(request?.resolved).toBe(false);

		expect(gate.resolve(true)).toBe(true);
		request?.resolve(false);

		await expect(pending).resolves.toEqual({ allowed: true, level: 'user-approved' });
		expect(request?.decision).toBe(true);
		expect(gate.resolve(true)).toBe(false);
	});

	it('denies a second confirmation while one is outstanding', async () => {
		const gate = createPermissionGate({ mode: 'safe' });
		gate.setRequestListener(() => undefined);

		const first = gate.evaluate('Bash', { command: 'make' });
		await tick();
		const second = await gate.evaluate('Bash', { command: 'make install' });

		expect(second).toMatchObject({ allowed: false, level: 'busy' });
		gate.resolve(true);
		await expect(first).resolves.toEqual({ allowed: true, level: 'user-approved' });
	});

	it('denies when no one is listening for requests', async () => {
		const gate = createPermissionGate({ mode: 'safe' });

		const decision = await gate.evaluate('Bash', { command: 'make' });

		expect(decision).toMatchObject({ allowed: false, level: 'unavailable' });
	});

	it('cancels the outstanding request when the signal aborts', async () => {
		const gate = createPermissionGate({ mode: 'yolo' });
		gate.setRequestListener(() => undefined);
		const controller = new AbortController();

		const pending = gate.evaluate('Bash', { command: 'git push --force' }, { signal: controller.signal });
		await tick();
		const request = gate.getPendingRequest();
		controller.abort();

		await expect(pending).resolves.toMatchObject({ allowed: false, level: 'cancelled', guardrail: true });
		expect(request?.decision).toBe(false);
		expect(gate.getPendingRequest()).toBeNull();
		expect(gate.cancelPending()).toBe(false);
	});

	it('refuses to prompt for an already aborted call', async () => {
		const gate = createPermissionGate({ mode: 'safe' });
		const listener = vi.fn();
		gate.setRequestListener(listener);
		const controller = new AbortController();
		controller.abort();

		const decision = await gate.evaluate('Bash', { command: 'make' }, { signal: controller.signal });

		expect(decision).toMatchObject({ allowed: false, level: 'cancelled' });
		expect(listener).not.toHaveBeenCalled();
	});

	it('cancelPending denies the outstanding request', async () => {
		const gate = createPermissionGate({ mode: 'safe' });
		gate.setRequestListener(() => undefined);

		const pending = gate.evaluate('Bash', { command: 'make' });
		await tick();

		expect(gate.cancelPending()).toBe(true);
		await expect(pending).resolves.toMatchObject({ allowed: false, level: 'cancelled' });
	});

	it('applies mode changes to later calls', async () => {
		const gate = createPermissionGate({ mode: 'safe' });
		expect(gate.cycleMode()).toBe('default');
		expect(gate.getMode()).toBe('default');

		gate.setMode('yolo');
		await expect(gate.evaluate('Edit', { file_path: 'a', old_string: 'a', new_string: 'b' })).resolves.toEqual({
			allowed: true,
			level: 'auto',
		});
	});
});
