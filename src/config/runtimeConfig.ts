import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { isSupportedEncoding } from '../engine/lineSplitter.js';

const DEFAULT_MAX_FILE_SIZE = 100 * 1024 * 1024;

// Names become source id segments.
const NameSchema = z
  .string()
  .trim()
  .min(1)
  .regex(/^[^/]+$/, 'name must not contain "/"');

const EncodingSchema = z
  .string()
  .trim()
  .refine((value) => isSupportedEncoding(value), { message: 'unsupported encoding' });

const LogFileSchema = z
  .object({
    name: NameSchema,
    path: z.string().trim().min(1),
    encoding: EncodingSchema.optional(),
    alwaysOn: z.boolean().optional()
  })
  .strict();

const LogDirectorySchema = z
  .object({
    name: NameSchema,
    scanDir: z.string().trim().min(1),
    pattern: z.string().trim().min(1).optional(),
    recursive: z.boolean().optional(),
    encoding: EncodingSchema.optional(),
    alwaysOn: z.boolean().optional()
  })
  .strict();

const RemoteLogSchema = z
  .object({
    name: NameSchema,
    path: z.string().trim().min(1),
    type: z.enum(['file', 'directory']).optional(),
    pattern: z.string().trim().min(1).optional(),
    recursive: z.boolean().optional(),
    encoding: EncodingSchema.optional(),
    alwaysOn: z.boolean().optional()
  })
  .strict();

const RemoteServerSchema = z
  .object({
    name: NameSchema,
    host: z.string().trim().min(1),
    port: z.number().int().min(1).max(65_535).optional(),
    user: z.string().trim().min(1),
    authMethod: z.enum(['key', 'password']).optional(),
    keyPath: z.string().trim().min(1).optional(),
    password: z.string().min(1).optional(),
    allowedPaths: z.array(z.string().trim().min(1)).min(1),
    maxFileSize: z.number().int().positive().optional(),
    hostFingerprint: z.string().trim().regex(/^SHA256:/, 'hostFingerprint must start with "SHA256:"').optional(),
    trustUnknownHostKeys: z.boolean().optional(),
    logs: z.array(RemoteLogSchema).default([])
  })
  .strict()
  .superRefine((server, ctx) => {
    const authMethod = server.authMethod ?? 'key';
    if (authMethod === 'key' && !server.keyPath) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${server.name}: keyPath is required for key authentication` });
    }
    if (authMethod === 'password' && !server.password) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${server.name}: password is required for password authentication` });
    }
  });

const positiveInt = z.number().int().positive();

const YamlConfigSchema = z
  .object({
    server: z
      .object({
        host: z.string().trim().optional(),
        port: z.number().int().min(1).max(65_535).optional()
      })
      .strict()
      .optional(),
    engine: z
      .object({
        pool: z
          .object({
            maxConnections: positiveInt.optional(),
            acquireTimeoutMs: positiveInt.optional(),
            idleTimeoutMs: positiveInt.optional(),
            maxSessionAgeMs: positiveInt.optional(),
            sweepIntervalMs: positiveInt.optional(),
            connectTimeoutMs: positiveInt.optional(),
            keepaliveIntervalMs: positiveInt.optional(),
            probeTimeoutMs: positiveInt.optional()
          })
          .strict()
          .optional(),
        reconnect: z
          .object({
            baseDelayMs: positiveInt.optional(),
            maxDelayMs: positiveInt.optional(),
            jitter: z.boolean().optional(),
            maxAttempts: z.number().int().nonnegative().optional()
          })
          .strict()
          .optional(),
        hub: z
          .object({
            queueCapacity: positiveInt.optional(),
            replayLines: z.number().int().nonnegative().optional(),
            heartbeatMs: positiveInt.optional()
          })
          .strict()
          .optional(),
        tailer: z
          .object({
            maxLineLength: positiveInt.optional(),
            backlogBytes: z.number().int().nonnegative().optional(),
            pollIntervalMs: positiveInt.optional(),
            readChunkBytes: positiveInt.optional()
          })
          .strict()
          .optional(),
        scanner: z
          .object({
            rescanIntervalMs: positiveInt.optional(),
            maxFiles: positiveInt.optional()
          })
          .strict()
          .optional()
      })
      .strict()
      .optional(),
    allowedPaths: z.array(z.string().trim().min(1)).optional(),
    logFiles: z.array(LogFileSchema).optional(),
    logDirectories: z.array(LogDirectorySchema).optional(),
    remoteServers: z.array(RemoteServerSchema).optional()
  })
  .strict();

const RuntimeConfigSchema = z
  .object({
    configFile: z.string().min(1),
    server: z.object({
      host: z.string().min(1),
      port: z.number().int().min(0).max(65_535)
    }),
    engine: z.object({
      pool: z.object({
        maxConnections: positiveInt,
        acquireTimeoutMs: positiveInt,
        idleTimeoutMs: positiveInt,
        maxSessionAgeMs: positiveInt,
        sweepIntervalMs: positiveInt,
        connectTimeoutMs: positiveInt,
        keepaliveIntervalMs: positiveInt,
        probeTimeoutMs: positiveInt
      }),
      reconnect: z.object({
        baseDelayMs: positiveInt,
        maxDelayMs: positiveInt,
        jitter: z.boolean(),
        maxAttempts: z.number().int().nonnegative()
      }),
      hub: z.object({
        queueCapacity: positiveInt,
        replayLines: z.number().int().nonnegative(),
        heartbeatMs: positiveInt
      }),
      tailer: z.object({
        maxLineLength: positiveInt,
        backlogBytes: z.number().int().nonnegative(),
        pollIntervalMs: positiveInt,
        readChunkBytes: positiveInt
      }),
      scanner: z.object({
        rescanIntervalMs: positiveInt,
        maxFiles: positiveInt
      })
    }),
    allowedPaths: z.array(z.string()),
    logFiles: z.array(
      z.object({
        name: z.string(),
        path: z.string(),
        encoding: z.string(),
        alwaysOn: z.boolean()
      })
    ),
    logDirectories: z.array(
      z.object({
        name: z.string(),
        scanDir: z.string(),
        pattern: z.string(),
        recursive: z.boolean(),
        encoding: z.string(),
        alwaysOn: z.boolean()
      })
    ),
    remoteServers: z.array(
      z.object({
        name: z.string(),
        host: z.string(),
        port: z.number().int(),
        user: z.string(),
        authMethod: z.enum(['key', 'password']),
        keyPath: z.string().optional(),
        password: z.string().optional(),
        allowedPaths: z.array(z.string()).min(1),
        maxFileSize: positiveInt,
        hostFingerprint: z.string().optional(),
        trustUnknownHostKeys: z.boolean(),
        logs: z.array(
          z.object({
            name: z.string(),
            path: z.string(),
            type: z.enum(['file', 'directory']),
            pattern: z.string(),
            recursive: z.boolean(),
            encoding: z.string(),
            alwaysOn: z.boolean()
          })
        )
      })
    )
  })
  .strict();

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
export type LogFileConfig = RuntimeConfig['logFiles'][number];
export type LogDirectoryConfig = RuntimeConfig['logDirectories'][number];
export type RemoteServerConfig = RuntimeConfig['remoteServers'][number];
export type EngineConfig = RuntimeConfig['engine'];

type Env = Record<string, string | undefined>;

function parseEnvNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function loadYamlConfig(filePath: string): z.infer<typeof YamlConfigSchema> {
  if (!existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const raw = readFileSync(filePath, 'utf8');
  const parsed: unknown = parseYaml(raw) ?? {};
  const result = YamlConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(
      `Invalid config file ${filePath}: ${result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')}`
    );
  }
  return result.data;
}

/** Reads and validates one config file; `env` overrides the engine tunables. */
export function loadRuntimeConfig(configFile: string, env: Env = process.env): RuntimeConfig {
  const yamlConfig = loadYamlConfig(configFile);
  const engineYaml = yamlConfig.engine ?? {};
  const poolYaml = engineYaml.pool ?? {};
  const reconnectYaml = engineYaml.reconnect ?? {};
  const hubYaml = engineYaml.hub ?? {};
  const tailerYaml = engineYaml.tailer ?? {};
  const scannerYaml = engineYaml.scanner ?? {};

  const server = {
    host: String(env.HOST ?? yamlConfig.server?.host ?? '127.0.0.1').trim(),
    port: parseEnvNumber(env.PORT, yamlConfig.server?.port ?? 8000)
  };

  const engine = {
    pool: {
      maxConnections: parseEnvNumber(env.POOL_MAX_CONNECTIONS, poolYaml.maxConnections ?? 10),
      acquireTimeoutMs: parseEnvNumber(env.POOL_ACQUIRE_TIMEOUT_MS, poolYaml.acquireTimeoutMs ?? 10_000),
      idleTimeoutMs: parseEnvNumber(env.POOL_IDLE_TIMEOUT_MS, poolYaml.idleTimeoutMs ?? 300_000),
      maxSessionAgeMs: parseEnvNumber(env.POOL_MAX_SESSION_AGE_MS, poolYaml.maxSessionAgeMs ?? 1_800_000),
      sweepIntervalMs: parseEnvNumber(env.POOL_SWEEP_INTERVAL_MS, poolYaml.sweepIntervalMs ?? 30_000),
      connectTimeoutMs: parseEnvNumber(env.SSH_CONNECT_TIMEOUT_MS, poolYaml.connectTimeoutMs ?? 10_000),
      keepaliveIntervalMs: parseEnvNumber(env.SSH_KEEPALIVE_INTERVAL_MS, poolYaml.keepaliveIntervalMs ?? 15_000),
      probeTimeoutMs: parseEnvNumber(env.POOL_PROBE_TIMEOUT_MS, poolYaml.probeTimeoutMs ?? 5_000)
    },
    reconnect: {
      baseDelayMs: parseEnvNumber(env.RECONNECT_BASE_DELAY_MS, reconnectYaml.baseDelayMs ?? 1_000),
      maxDelayMs: parseEnvNumber(env.RECONNECT_MAX_DELAY_MS, reconnectYaml.maxDelayMs ?? 30_000),
      jitter: reconnectYaml.jitter ?? true,
      maxAttempts: parseEnvNumber(env.RECONNECT_MAX_ATTEMPTS, reconnectYaml.maxAttempts ?? 10)
    },
    hub: {
      queueCapacity: parseEnvNumber(env.HUB_QUEUE_CAPACITY, hubYaml.queueCapacity ?? 5_000),
      replayLines: parseEnvNumber(env.HUB_REPLAY_LINES, hubYaml.replayLines ?? 200),
      heartbeatMs: parseEnvNumber(env.SSE_HEARTBEAT_MS, hubYaml.heartbeatMs ?? 15_000)
    },
    tailer: {
      maxLineLength: parseEnvNumber(env.MAX_LINE_LENGTH, tailerYaml.maxLineLength ?? 16_384),
      backlogBytes: parseEnvNumber(env.TAILER_BACKLOG_BYTES, tailerYaml.backlogBytes ?? 10_240),
      pollIntervalMs: parseEnvNumber(env.TAILER_POLL_INTERVAL_MS, tailerYaml.pollIntervalMs ?? 1_000),
      readChunkBytes: tailerYaml.readChunkBytes ?? 65_536
    },
    scanner: {
      rescanIntervalMs: parseEnvNumber(env.RESCAN_INTERVAL_MS, scannerYaml.rescanIntervalMs ?? 30_000),
      maxFiles: scannerYaml.maxFiles ?? 1_000
    }
  };

  const logFiles = (yamlConfig.logFiles ?? []).map((file) => ({
    name: file.name,
    path: file.path,
    encoding: file.encoding ?? 'utf-8',
    alwaysOn: file.alwaysOn ?? false
  }));

  const logDirectories = (yamlConfig.logDirectories ?? []).map((dir) => ({
    name: dir.name,
    scanDir: dir.scanDir,
    pattern: dir.pattern ?? '*.log',
    recursive: dir.recursive ?? false,
    encoding: dir.encoding ?? 'utf-8',
    alwaysOn: dir.alwaysOn ?? false
  }));

  const remoteServers = (yamlConfig.remoteServers ?? []).map((server) => ({
    name: server.name,
    host: server.host,
    port: server.port ?? 22,
    user: server.user,
    authMethod: server.authMethod ?? 'key',
    keyPath: server.keyPath,
    password: server.password,
    allowedPaths: server.allowedPaths,
    maxFileSize: server.maxFileSize ?? DEFAULT_MAX_FILE_SIZE,
    hostFingerprint: server.hostFingerprint,
    trustUnknownHostKeys: server.trustUnknownHostKeys ?? false,
    logs: server.logs.map((entry) => ({
      name: entry.name,
      path: entry.path,
      type: entry.type ?? 'file',
      pattern: entry.pattern ?? '*.log',
      recursive: entry.recursive ?? false,
      encoding: entry.encoding ?? 'utf-8',
      alwaysOn: entry.alwaysOn ?? false
    }))
  }));

  return RuntimeConfigSchema.parse({
    configFile,
    server,
    engine,
    allowedPaths: yamlConfig.allowedPaths ?? [],
    logFiles,
    logDirectories,
    remoteServers
  });
}

let cachedRuntimeConfig: RuntimeConfig | null = null;

export function getRuntimeConfig(): RuntimeConfig {
  if (cachedRuntimeConfig) {
    return cachedRuntimeConfig;
  }

  const configFileRaw = String(process.env.TAILHUB_CONFIG_FILE ?? './config/tailhub.local.yaml').trim();
  cachedRuntimeConfig = loadRuntimeConfig(path.resolve(configFileRaw));
  return cachedRuntimeConfig;
}

export function resetRuntimeConfig(): void {
  cachedRuntimeConfig = null;
}
