export {
	createPermissionGate,
	type DenialLevel,
	type EvaluateOptions,
	type PermissionDecision,
	type PermissionGate,
	type PermissionGateOptions,
	type PermissionRequest,
	type PermissionRequestListener,
} from './gate.js';
export { isPermissionMode, needsPermission, nextMode, type PermissionMode } from './modes.js';
export { bashPreview, buildPreview, newFilePreview, type PreviewOptions, unifiedDiff } from './preview.js';
