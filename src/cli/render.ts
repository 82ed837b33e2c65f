import chalk, { type ChalkInstance } from 'chalk';
import type { ToolUsage } from '../audit/types.js';
import type { DangerClassification } from '../guardrails/classifier.js';
import type { PermissionRequest } from '../permissions/gate.js';
import type { PermissionMode } from '../permissions/modes.js';
import type { ToolResult } from '../tools/types.js';

export interface Renderer {
	result(result: ToolResult): string;
	request(request: PermissionRequest): string;
	verdict(command: string, classification: DangerClassification | null): string;
	usage(rows: ToolUsage[]): string;
	mode(mode: PermissionMode): string;
}

export function createRenderer(colors: ChalkInstance = chalk): Renderer {
	const modeColor: Record<PermissionMode, (text: string) => string> = {
		safe: colors.green,
		default: colors.cyan,
		yolo: colors.red,
	};

	function diffLine(line: string): string {
		if (line.startsWith('+++') || line.startsWith('---')) return colors.bold(line);
		if (line.startsWith('+')) return colors.green(line);
		if (line.startsWith('-')) return colors.red(line);
		if (line.startsWith('@@')) return colors.cyan(line);
		return line;
	}

	return {
		result(result) {
			if (result.guardrail) {
				return `${colors.bgRed.white.bold(' GUARDRAIL ')} ${colors.red(result.content)}`;
			}
			if (result.isError) {
				return `${colors.red(`[${result.errorKind ?? 'error'}]`)} ${result.content}`;
			}
			if (result.timedOut) {
				return `${result.content}\n${colors.yellow('[timed out]')}`;
			}
			return result.content;
		},
		request(request) {
			const heading = request.danger
				? `${colors.bgRed.white.bold(' GUARDRAIL ')} ${colors.bold(request.toolName)} needs confirmation`
				: `${colors.bold(request.toolName)} needs confirmation`;
			const body = request.previewText.split('\n').map(diffLine).join('\n');
			return `${heading}\n${body}`;
		},
		verdict(command, classification) {
			if (!classification) {
				return `${colors.green('no rule matched')}: ${command}`;
			}
			const label = classification.tier === 'block' ? colors.bgRed.white.bold(' BLOCK ') : colors.yellow.bold('CONFIRM');
			return `${label} ${classification.description}: ${command}`;
		},
		usage(rows) {
			if (rows.length === 0) return '(no tool calls recorded)';
			const header = `${'tool'.padEnd(8)}${'calls'.padStart(7)}${'errors'.padStart(8)}${'denied'.padStart(8)}${'time'.padStart(10)}`;
			const lines = rows.map(
				(row) =>
					`${row.tool.padEnd(8)}${String(row.calls).padStart(7)}${String(row.errors).padStart(8)}${String(row.denied).padStart(8)}${`${row.totalDurationMs}ms`.padStart(10)}`,
			);
			return [colors.bold(header), ...lines].join('\n');
		},
		mode(mode) {
			return `mode: ${modeColor[mode](mode)}`;
		},
	};
}
