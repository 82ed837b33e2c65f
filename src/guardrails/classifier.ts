export type DangerTier = 'block' | 'confirm';

export interface DangerClassification {
	tier: DangerTier;
	description: string;
}

interface PatternRule {
	pattern: RegExp;
	tier: DangerTier;
	description: string;
}

interface DeleteInvocation {
	recursive: boolean;
	force: boolean;
	targets: string[];
}

// Block rules are never overridable. Confirm rules always prompt, whatever
// the permission mode.
const BLOCK_RULES: PatternRule[] = [
	{ pattern: /\bmkfs(?:\.[a-z0-9]+)?\b/, tier: 'block', description: 'format filesystem' },
	{
		pattern: /\bdd\b.*\bof\s*=\s*\/dev\/(?!(?:null|zero|stdout|stderr|tty)\b)/,
		tier: 'block',
		description: 'write directly to raw device',
	},
	{
		pattern: />\s*\/dev\/(?:sd[a-z]|hd[a-z]|vd[a-z]|xvd[a-z]|nvme\d|mmcblk\d|disk\d)/,
		tier: 'block',
		description: 'redirect output onto a block device',
	},
];

const CONFIRM_RULES: PatternRule[] = [
	{
		pattern: /\bgit\s+reset\b[^;&|\n]*\s--hard\b/,
		tier: 'confirm',
		description: 'git reset --hard (discards changes)',
	},
	{
		pattern: /\bgit\s+push\b[^;&|\n]*\s(?:--force\S*|-[a-zA-Z]*f[a-zA-Z]*)(?=\s|$)/,
		tier: 'confirm',
		description: 'git force push (rewrites remote history)',
	},
	{
		pattern: /\bgit\s+clean\b[^;&|\n]*\s(?:-[a-zA-Z]*f|--force)/,
		tier: 'confirm',
		description: 'git clean (deletes untracked files)',
	},
	{
		pattern: /\btmux\s+kill-(?:session|server)\b/,
		tier: 'confirm',
		description: 'kill tmux session/server',
	},
	{ pattern: /\bkillall\s/, tier: 'confirm', description: 'kill processes by name (killall)' },
	{ pattern: /\bpkill\s/, tier: 'confirm', description: 'kill processes by pattern (pkill)' },
];

const SEGMENT_SEPARATOR = /&&|\|\||[;|&\n()`]|\$\(/;
const ROOT_TARGET = /^\/+(?:\.|\*)?$/;
const HOME_TARGET = /^(?:~|\$HOME|\$\{HOME\})\/?\*?$/;
const NEGATIVE_PID = /^-\d+$/;
// kill options that take the signal as the next word
const KILL_SIGNAL_OPTIONS = new Set(['-s', '-n']);

function tokenize(segment: string): string[] {
	return segment
		.trim()
		.split(/\s+/)
		.filter((token) => token.length > 0)
		.map((token) => token.replace(/^['"]+|['"]+$/g, ''));
}

function isCommand(name: string): (token: string) => boolean {
	return (token) => token === name || token.endsWith(`/${name}`);
}

const isDeleteCommand = isCommand('rm');
const isKillCommand = isCommand('kill');

/**
 * Collects the flags and operands of every `rm` in the command, one segment
 * at a time. Short flags are unioned across all option words, so `-rf`,
 * `-fr`, `-rfi` and `-r x -f` all read as recursive + force.
 */
export function findDeleteInvocations(command: string): DeleteInvocation[] {
	const invocations: DeleteInvocation[] = [];

	for (const segment of command.split(SEGMENT_SEPARATOR)) {
		const tokens = tokenize(segment);
		const start = tokens.findIndex(isDeleteCommand);
		if (start === -1) continue;

		const invocation: DeleteInvocation = { recursive: false, force: false, targets: [] };
		let endOfOptions = false;

		for (const arg of tokens.slice(start + 1)) {
			if (!endOfOptions && arg === '--') {
				endOfOptions = true;
				continue;
			}
			if (!endOfOptions && arg.startsWith('--')) {
				if (arg === '--recursive') invocation.recursive = true;
				if (arg === '--force') invocation.force = true;
				continue;
			}
			if (!endOfOptions && arg.startsWith('-') && arg.length > 1) {
				const letters = arg.slice(1);
				if (/[rR]/.test(letters)) invocation.recursive = true;
				if (letters.includes('f')) invocation.force = true;
				continue;
			}
			invocation.targets.push(arg);
		}

		invocations.push(invocation);
	}

	return invocations;
}

function classifyDeletes(command: string, tier: DangerTier): DangerClassification | null {
	for (const invocation of findDeleteInvocations(command)) {
		if (!invocation.recursive) continue;

		if (tier === 'block') {
			if (invocation.targets.some((target) => ROOT_TARGET.test(target))) {
				return { tier, description: 'recursive delete from filesystem root' };
			}
			if (invocation.targets.some((target) => HOME_TARGET.test(target))) {
				return { tier, description: 'recursive delete of home directory' };
			}
			continue;
		}

		if (invocation.force) {
			return { tier, description: 'recursive force delete (rm -rf)' };
		}
	}
	return null;
}

/**
 * Flags a `kill` whose target is process group 0, every process (-1) or a
 * negative process-group id. The first dash word, or `-s`/`-n` and its value,
 * is the signal; dash-numbers after it are targets.
 */
function classifyKills(command: string): DangerClassification | null {
	for (const segment of command.split(SEGMENT_SEPARATOR)) {
		const tokens = tokenize(segment);
		const start = tokens.findIndex(isKillCommand);
		if (start === -1) continue;

		const args = tokens.slice(start + 1);
		let signalGiven = false;
		let endOfOptions = false;
		for (let index = 0; index < args.length; index++) {
			const arg = args[index] ?? '';
			if (!endOfOptions) {
				if (arg === '--') {
					endOfOptions = true;
					continue;
				}
				if (KILL_SIGNAL_OPTIONS.has(arg)) {
					signalGiven = true;
					index++;
					continue;
				}
				if (!signalGiven && arg.startsWith('-') && arg.length > 1) {
					signalGiven = true;
					continue;
				}
			}

			if (arg === '0') {
				return { tier: 'confirm', description: 'kill the current process group' };
			}
			if (arg === '-1') {
				return { tier: 'confirm', description: 'kill every process owned by the user' };
			}
			if (NEGATIVE_PID.test(arg)) {
				return { tier: 'confirm', description: 'kill a process group' };
			}
		}
	}
	return null;
}

function firstMatch(rules: PatternRule[], command: string): DangerClassification | null {
	const rule = rules.find((candidate) => candidate.pattern.test(command));
	return rule ? { tier: rule.tier, description: rule.description } : null;
}

/**
 * Classifies a shell command's danger tier.
 *
 * Pure string matching: it does not parse the shell language, so variable
 * expansion, command substitution or aliases can hide a dangerous command.
 * `null` means no rule matched, which is not the same as "safe to run".
 */
export function classifyCommand(command: string): DangerClassification | null {
	return (
		classifyDeletes(command, 'block') ??
		firstMatch(BLOCK_RULES, command) ??
		classifyDeletes(command, 'confirm') ??
		firstMatch(CONFIRM_RULES, command) ??
		classifyKills(command)
	);
}
