import { bashTool } from './bash.js';
import { editTool } from './edit.js';
import { readTool } from './read.js';
import type { Tool } from './types.js';
import { writeTool } from './write.js';

export { bashTool } from './bash.js';
export { editTool, countOccurrences, planEdit } from './edit.js';
export { toolError, toolSuccess } from './errors.js';
export { writeFileAtomic } from './fs-write.js';
export { formatNumberedLine, readTool, splitFileLines } from './read.js';
export {
	createTool,
	type PreparedCall,
	TOOL_ERROR_KINDS,
	type PrepareResult,
	type Tool,
	type ToolContext,
	type ToolDefinition,
	type ToolErrorKind,
	type ToolResult,
} from './types.js';
export { writeTool } from './write.js';

export function getBuiltinTools(): Tool[] {
	return [readTool, editTool, writeTool, bashTool];
}
