import { PERMISSION_MODES, type PermissionModeName } from '../config/schema.js';

export type PermissionMode = PermissionModeName;

export { PERMISSION_MODES };

const GATED_FILE_TOOLS = new Set(['Edit', 'Write']);

/** safe → default → yolo → safe */
export function nextMode(mode: PermissionMode): PermissionMode {
	const index = PERMISSION_MODES.indexOf(mode);
	return PERMISSION_MODES[(index + 1) % PERMISSION_MODES.length] ?? 'safe';
}

/**
 * Whether a tool call needs an operator decision in the given mode.
 * Guardrail tiers are checked separately and ignore the mode.
 */
export function needsPermission(mode: PermissionMode, toolName: string): boolean {
	if (mode === 'yolo') return false;
	if (GATED_FILE_TOOLS.has(toolName)) return true;
	return toolName === 'Bash' && mode === 'safe';
}

export function isPermissionMode(value: string): value is PermissionMode {
	return PERMISSION_MODES.some((mode) => mode === value);
}
