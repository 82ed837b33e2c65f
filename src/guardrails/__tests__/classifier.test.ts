import { describe, expect, it } from 'vitest';
import { classifyCommand, findDeleteInvocations } from '../classifier.js';

describe('classifyCommand', () => {
	it.each([
		['rm -rf /', 'recursive delete from filesystem root'],
		['rm -rf /*', 'recursive delete from filesystem root'],
		['rm -r -f /', 'recursive delete from filesystem root'],
		['sudo rm -fr "/"', 'recursive delete from filesystem root'],
		['rm -rf ~', 'recursive delete of home directory'],
		['rm -rf ~/', 'recursive delete of home directory'],
		['cd /tmp && rm -r "$HOME"', 'recursive delete of home directory'],
		['mkfs.ext4 /dev/sdb1', 'format filesystem'],
		['dd if=/dev/zero of=/dev/sda bs=1M', 'write directly to raw device'],
		['cat image.iso > /dev/sdb', 'redirect output onto a block device'],
	])('blocks %s', (command, description) => {
		expect(classifyCommand(command)).toEqual({ tier: 'block', description });
	});

	it.each([
		['rm -rf /tmp/x', 'recursive force delete (rm -rf)'],
		['rm -r foo -f', 'recursive force delete (rm -rf)'],
		['rm -rfi build', 'recursive force delete (rm -rf)'],
		['rm --recursive --force dist', 'recursive force delete (rm -rf)'],
		['find . -name "*.o" | xargs rm -fr', 'recursive force delete (rm -rf)'],
		['rm -rf ~/projects/old', 'recursive force delete (rm -rf)'],
		['git reset --hard HEAD~1', 'git reset --hard (discards changes)'],
		['git push --force origin main', 'git force push (rewrites remote history)'],
		['git push -f', 'git force push (rewrites remote history)'],
		['git push --force-with-lease', 'git force push (rewrites remote history)'],
		['git clean -fdx', 'git clean (deletes untracked files)'],
		['tmux kill-server', 'kill tmux session/server'],
		['kill -9 0', 'kill the current process group'],
		['kill -TERM -- -4242', 'kill a process group'],
		['kill -9 -1', 'kill every process owned by the user'],
		['kill -9 -1234', 'kill a process group'],
		['kill -TERM -4321', 'kill a process group'],
		['kill -s KILL 0', 'kill the current process group'],
		['kill -n 9 -- -77', 'kill a process group'],
		['sleep 1; /bin/kill 0', 'kill the current process group'],
		['killall node', 'kill processes by name (killall)'],
		['pkill -f "vite dev"', 'kill processes by pattern (pkill)'],
	])('asks for confirmation on %s', (command, description) => {
		expect(classifyCommand(command)).toEqual({ tier: 'confirm', description });
	});

	it.each([
		'ls -la',
		'rm file.txt',
		'rm -f stale.lock',
		'rm -r build',
		'git push origin main',
		'git push -u origin feature',
		'git reset HEAD~1',
		'git clean -n',
		'dd if=/dev/zero of=/dev/null count=1',
		'echo done > /dev/null',
		'kill 1234',
		'kill -1 1234',
		'kill -s HUP 1234',
		'kill -l',
	])('has no opinion on %s', (command) => {
		expect(classifyCommand(command)).toBeNull();
	});

	it('checks block rules before confirm rules', () => {
		expect(classifyCommand('git reset --hard && rm -rf /')?.tier).toBe('block');
	});

	it('does not see through variable indirection', () => {
		expect(classifyCommand('R=rm; $R -rf /')).toBeNull();
	});
});

describe('findDeleteInvocations', () => {
	it('unions split flags and keeps operands', () => {
		expect(findDeleteInvocations('rm -r foo -f')).toEqual([
			{ recursive: true, force: true, targets: ['foo'] },
		]);
	});

	it('stops option parsing at --', () => {
		expect(findDeleteInvocations('rm -r -- -f')).toEqual([
			{ recursive: true, force: false, targets: ['-f'] },
		]);
	});

	it('keeps flags from separate commands apart', () => {
		expect(findDeleteInvocations('rm -r a; ls -f')).toEqual([
			{ recursive: true, force: false, targets: ['a'] },
		]);
	});
});
