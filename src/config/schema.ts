import { z } from 'zod';

export const PERMISSION_MODES = ['safe', 'default', 'yolo'] as const;

const AgentSchema = z.object({
	id: z.string().min(1).optional(),
});

const PermissionsSchema = z.object({
	defaultMode: z.enum(PERMISSION_MODES).default('default'),
});

const ShellSchema = z.object({
	shell: z.string().min(1).default('bash'),
	cwd: z.string().min(1).optional(),
	defaultTimeoutMs: z.number().int().positive().default(120_000),
	maxTimeoutMs: z.number().int().positive().default(600_000),
	outputLimit: z.number().int().positive().default(30_000),
	killGraceMs: z.number().int().nonnegative().default(500),
	closeTimeoutMs: z.number().int().positive().default(5_000),
	stripEnvPrefixes: z.array(z.string().min(1)).default(['TOLLGATE_']),
});

const FilesSchema = z.object({
	maxLineLength: z.number().int().positive().default(2_000),
	defaultReadLimit: z.number().int().positive().default(2_000),
	newFilePreviewLines: z.number().int().positive().default(15),
});

const AuditSchema = z.object({
	enabled: z.boolean().default(true),
	dbPath: z.string().default('~/.tollgate/audit.db'),
});

const LoggingSchema = z.object({
	level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
	file: z.string().default('~/.tollgate/logs/tollgate.log'),
});

export const ConfigSchema = z.object({
	version: z.number().int().default(1),
	agent: AgentSchema.default({}),
	permissions: PermissionsSchema.default({}),
	shell: ShellSchema.default({}),
	files: FilesSchema.default({}),
	audit: AuditSchema.default({}),
	logging: LoggingSchema.default({}),
});

export type TollgateConfig = z.infer<typeof ConfigSchema>;
export type ShellConfig = TollgateConfig['shell'];
export type FilesConfig = TollgateConfig['files'];
export type LogLevel = TollgateConfig['logging']['level'];
export type PermissionModeName = (typeof PERMISSION_MODES)[number];
