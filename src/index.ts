#!/usr/bin/env node

import { Command } from 'commander';
import { registerClassifyCommand, registerExecCommand, registerShellCommand } from './cli/commands.js';
import { createRenderer } from './cli/render.js';
import { openCliSession } from './cli/runtime.js';

const program = new Command();
const commandOptions = {
	io: { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr },
	renderer: createRenderer(),
	openSession: openCliSession,
};

program.name('tollgate').description('Supervised shell and file tools for automation agents').version('0.1.0');

registerClassifyCommand(program, commandOptions);
registerExecCommand(program, commandOptions);
registerShellCommand(program, commandOptions);

await program.parseAsync(process.argv);
