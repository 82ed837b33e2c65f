import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { getConfig, initConfig, loadConfig, parseConfig, resetConfig } from '../loader.js';

const testDir = join(tmpdir(), 'tollgate-test-config');
const testConfigPath = join(testDir, 'config.yaml');

beforeEach(() => {
	mkdirSync(testDir, { recursive: true });
	resetConfig();
});

afterEach(() => {
	rmSync(testDir, { recursive: true, force: true });
	resetConfig();
});

describe('loadConfig', () => {
	it('returns defaults when config file does not exist', () => {
		const result = loadConfig('/nonexistent/config.yaml');
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.version).toBe(1);
			expect(result.value.permissions.defaultMode).toBe('default');
			expect(result.value.shell.defaultTimeoutMs).toBe(120_000);
			expect(result.value.shell.outputLimit).toBe(30_000);
			expect(result.value.files.maxLineLength).toBe(2_000);
			expect(result.value.logging.level).toBe('info');
		}
	});

	it('loads snake_case YAML keys into camelCase config', () => {
		writeFileSync(
			testConfigPath,
			`
version: 1
permissions:
  default_mode: safe
shell:
  default_timeout_ms: 5000
  strip_env_prefixes: ["AGENT_"]
files:
  new_file_preview_lines: 5
logging:
  level: debug
`,
		);

		const result = loadConfig(testConfigPath);
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.permissions.defaultMode).toBe('safe');
			expect(result.value.shell.defaultTimeoutMs).toBe(5000);
			expect(result.value.shell.stripEnvPrefixes).toEqual(['AGENT_']);
			expect(result.value.files.newFilePreviewLines).toBe(5);
			expect(result.value.logging.level).toBe('debug');
		}
	});

	it('resolves environment variable references', () => {
		process.env.TOLLGATE_TEST_AGENT = 'builder-7';

		writeFileSync(
			testConfigPath,
			`
agent:
  id: "\${TOLLGATE_TEST_AGENT}"
`,
		);

		const result = loadConfig(testConfigPath);
		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.agent.id).toBe('builder-7');
		}

		delete process.env.TOLLGATE_TEST_AGENT;
	});

	it('rejects an unknown permission mode', () => {
		const result = parseConfig({ permissions: { default_mode: 'reckless' } });
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toContain('permissions.defaultMode');
		}
	});

	it('rejects a non-positive timeout', () => {
		const result = parseConfig({ shell: { default_timeout_ms: 0 } });
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toContain('shell.defaultTimeoutMs');
		}
	});

	it('reports malformed YAML', () => {
		writeFileSync(testConfigPath, 'shell: [unclosed');

		const result = loadConfig(testConfigPath);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toContain('Failed to parse config');
		}
	});
});

describe('initConfig / getConfig', () => {
	it('throws before initialization', () => {
		expect(() => getConfig()).toThrow('Config not initialized');
	});

	it('holds the loaded config', () => {
		const result = initConfig('/nonexistent/config.yaml');
		expect(result.ok).toBe(true);
		expect(getConfig().audit.enabled).toBe(true);
	});
});
