import { readFile } from 'node:fs/promises';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('permissions');

const DIFF_CONTEXT_LINES = 3;
// Table cells the line diff may allocate before it falls back to a summary
const MAX_DIFF_CELLS = 4_000_000;

type DiffOp = { kind: ' ' | '-' | '+'; line: string; oldPos: number; newPos: number };

export interface PreviewOptions {
	/** Resolves the tool's `file_path` the same way the tool will. */
	resolvePath: (filePath: string) => string;
	newFilePreviewLines: number;
}

function splitLines(text: string): string[] {
	if (text.length === 0) return [];
	const lines = text.split(/\r?\n/);
	if (lines[lines.length - 1] === '') lines.pop();
	return lines;
}

/**
 * Line diff by longest common subsequence over the region between the
 * common prefix and suffix. Returns null when that region is too large to
 * tabulate.
 */
function diffOps(oldLines: string[], newLines: string[]): DiffOp[] | null {
	let prefix = 0;
	while (prefix < oldLines.length && prefix < newLines.length && oldLines[prefix] === newLines[prefix]) {
		prefix++;
	}
	let suffix = 0;
	while (
		suffix < oldLines.length - prefix &&
		suffix < newLines.length - prefix &&
		oldLines[oldLines.length - 1 - suffix] === newLines[newLines.length - 1 - suffix]
	) {
		suffix++;
	}

	const rows = oldLines.length - prefix - suffix;
	const cols = newLines.length - prefix - suffix;
	if ((rows + 1) * (cols + 1) > MAX_DIFF_CELLS) return null;

	// lcs[i * width + j] = length of the longest common subsequence of the
	// changed old lines from i and the changed new lines from j
	const width = cols + 1;
	const lcs = new Uint32Array((rows + 1) * width);
	const at = (i: number, j: number): number => lcs[i * width + j] ?? 0;
	for (let i = rows - 1; i >= 0; i--) {
		for (let j = cols - 1; j >= 0; j--) {
			lcs[i * width + j] =
				oldLines[prefix + i] === newLines[prefix + j] ? at(i + 1, j + 1) + 1 : Math.max(at(i + 1, j), at(i, j + 1));
		}
	}

	const ops: DiffOp[] = [];
	for (let k = 0; k < prefix; k++) {
		ops.push({ kind: ' ', line: oldLines[k] ?? '', oldPos: k, newPos: k });
	}
	let i = 0;
	let j = 0;
	while (i < rows || j < cols) {
		const oldLine = oldLines[prefix + i];
		const newLine = newLines[prefix + j];
		if (i < rows && j < cols && oldLine === newLine) {
			ops.push({ kind: ' ', line: oldLine ?? '', oldPos: prefix + i, newPos: prefix + j });
			i++;
			j++;
		} else if (i < rows && (j >= cols || at(i + 1, j) >= at(i, j + 1))) {
			ops.push({ kind: '-', line: oldLine ?? '', oldPos: prefix + i, newPos: prefix + j });
			i++;
		} else {
			ops.push({ kind: '+', line: newLine ?? '', oldPos: prefix + i, newPos: prefix + j });
			j++;
		}
	}
	for (let k = 0; k < suffix; k++) {
		const oldPos = prefix + rows + k;
		ops.push({ kind: ' ', line: oldLines[oldPos] ?? '', oldPos, newPos: prefix + cols + k });
	}
	return ops;
}

function formatRange(position: number, length: number): string {
	if (length === 1) return `${position + 1}`;
	if (length === 0) return `${position},0`;
	return `${position + 1},${length}`;
}

/**
 * Unified line diff with three lines of context, in the shape `diff -u`
 * prints it. Returns an empty string when the texts have the same lines,
 * and a one-line summary when the changed region is too large to diff.
 */
export function unifiedDiff(oldText: string, newText: string, label: string): string {
	const oldLines = splitLines(oldText);
	const newLines = splitLines(newText);
	const ops = diffOps(oldLines, newLines);
	if (!ops) {
		return `${label}: ${oldLines.length} lines -> ${newLines.length} lines (too many changed lines to show a diff)`;
	}
	const changed = ops.flatMap((op, index) => (op.kind === ' ' ? [] : [index]));
	const first = changed[0];
	if (first === undefined) return '';

	const out = [`--- ${label}`, `+++ ${label}`];
	let hunkStart = Math.max(0, first - DIFF_CONTEXT_LINES);
	let hunkEnd = first;

	const flush = (): void => {
		const end = Math.min(ops.length - 1, hunkEnd + DIFF_CONTEXT_LINES);
		const hunk = ops.slice(hunkStart, end + 1);
		const head = hunk[0];
		if (!head) return;
		const oldLength = hunk.filter((op) => op.kind !== '+').length;
		const newLength = hunk.filter((op) => op.kind !== '-').length;
		out.push(`@@ -${formatRange(head.oldPos, oldLength)} +${formatRange(head.newPos, newLength)} @@`);
		for (const op of hunk) out.push(`${op.kind}${op.line}`);
	};

	for (const index of changed.slice(1)) {
		if (index - hunkEnd > DIFF_CONTEXT_LINES * 2 + 1) {
			flush();
			hunkStart = index - DIFF_CONTEXT_LINES;
		}
		hunkEnd = index;
	}
	flush();

	return out.join('\n');
}

export function newFilePreview(content: string, maxLines: number): string {
	const lines = splitLines(content);
	const parts = [`new file (${lines.length} lines)`];
	for (const line of lines.slice(0, maxLines)) {
		parts.push(`+${line}`);
	}
	if (lines.length > maxLines) {
		parts.push(`... (${lines.length - maxLines} more lines)`);
	}
	return parts.join('\n');
}

export function bashPreview(command: string, description?: string): string {
	return description ? `${description}\n$ ${command}` : `$ ${command}`;
}

function stringField(input: Record<string, unknown>, key: string): string {
	const value = input[key];
	return typeof value === 'string' ? value : '';
}

async function readExisting(path: string): Promise<string | null> {
	try {
		return await readFile(path, 'utf8');
	} catch (err: unknown) {
		logger.debug('No existing file to diff against', {
			path,
			reason: err instanceof Error ? err.message : String(err),
		});
		return null;
	}
}

/**
 * Text shown to the operator when a tool call needs a decision.
 */
export async function buildPreview(
	toolName: string,
	toolInput: Record<string, unknown>,
	options: PreviewOptions,
): Promise<string> {
	const filePath = stringField(toolInput, 'file_path');

	switch (toolName) {
		case 'Edit': {
			const diff = unifiedDiff(
				stringField(toolInput, 'old_string'),
				stringField(toolInput, 'new_string'),
				filePath,
			);
			return diff || `${filePath}: no line changes`;
		}
		case 'Write': {
			const content = stringField(toolInput, 'content');
			const existing = await readExisting(options.resolvePath(filePath));
			if (existing === null) {
				return newFilePreview(content, options.newFilePreviewLines);
			}
			return unifiedDiff(existing, content, filePath) || `${filePath}: no line changes`;
		}
		case 'Bash':
			return bashPreview(stringField(toolInput, 'command'), stringField(toolInput, 'description'));
		default:
			return `${toolName} ${JSON.stringify(toolInput)}`;
	}
}
