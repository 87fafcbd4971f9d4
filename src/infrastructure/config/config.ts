import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { DEFAULT_SINK_LIMITS } from '../sinks/types.js';
import type { SinkKind } from '../sinks/types.js';

/** Raised when the configuration file or environment does not validate. */
export class ConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(message: string, issues: z.ZodIssue[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const sinkSection = (defaultName: string) =>
  z
    .object({
      type: z.enum(['stream', 'queue', 'topic', 'stdout']).default('stream'),
      name: z.string().min(1).default(defaultName),
      max_batch_bytes: positiveInt.optional(),
      max_batch_records: positiveInt.optional(),
      max_record_bytes: positiveInt.optional(),
      time_limit_ms: positiveInt.default(500),
      stream_max_len: nonNegativeInt.default(0),
    })
    .default({});

const rawConfigSchema = z.object({
  http: z
    .object({
      host: z.string().min(1).default('0.0.0.0'),
      port: z.coerce.number().int().min(0).max(65535).default(8080),
    })
    .default({}),
  collector: z
    .object({
      name: z.string().min(1).default('beacon-relay'),
      ip_partition_key: z.boolean().default(true),
      redact_headers: z.array(z.string()).default(['authorization', 'cookie']),
    })
    .default({}),
  redis: z
    .object({
      url: z.string().min(1).default('redis://localhost:6379'),
      command_timeout_ms: positiveInt.default(5000),
    })
    .default({}),
  good: sinkSection('collector:good'),
  bad: sinkSection('collector:bad'),
  buffer: z
    .object({
      max_buffered_bytes: positiveInt.default(64 * 1024 * 1024),
    })
    .default({}),
  backoff: z
    .object({
      initial_delay_ms: positiveInt.default(100),
      multiplier: z.coerce.number().min(1).default(2),
      jitter: z.coerce.number().min(0).lt(1).default(0.2),
      max_delay_ms: positiveInt.default(10_000),
      total_backoff_ms: positiveInt.default(60_000),
      max_retries: nonNegativeInt.default(0),
      seed: z.coerce.number().int().optional(),
    })
    .default({}),
  outage: z
    .object({
      unhealthy_threshold: positiveInt.default(3),
      probe_interval_ms: positiveInt.default(1000),
      startup_check: z.boolean().default(true),
    })
    .default({}),
  shutdown: z
    .object({
      drain_timeout_ms: positiveInt.default(30_000),
      pre_termination_ms: nonNegativeInt.default(0),
    })
    .default({}),
  warmup: z
    .object({
      enabled: z.boolean().default(true),
      max_attempts: positiveInt.default(10),
      interval_ms: positiveInt.default(1000),
    })
    .default({}),
  log: z
    .object({
      level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    })
    .default({}),
});

type RawConfig = z.infer<typeof rawConfigSchema>;
type RawSinkSection = RawConfig['good'];

export interface SinkConfig {
  type: SinkKind;
  /** Stream key, list key or channel name. */
  name: string;
  maxBatchBytes: number;
  maxBatchRecords: number;
  maxRecordBytes: number;
  timeLimitMs: number;
  streamMaxLen: number;
}

export interface CollectorConfig {
  logLevel: RawConfig['log']['level'];
  http: { host: string; port: number };
  collector: { name: string; ipPartitionKey: boolean; redactHeaders: string[] };
  redis: { url: string; commandTimeoutMs: number };
  good: SinkConfig;
  bad: SinkConfig;
  buffer: { maxBufferedBytes: number };
  backoff: {
    initialDelayMs: number;
    multiplier: number;
    jitter: number;
    maxDelayMs: number;
    totalBackoffMs: number;
    maxRetries: number;
    seed?: number;
  };
  outage: { unhealthyThreshold: number; probeIntervalMs: number; startupCheck: boolean };
  shutdown: { drainTimeoutMs: number; preTerminationMs: number };
  warmup: { enabled: boolean; maxAttempts: number; intervalMs: number };
}

type YamlSections = Record<string, Record<string, unknown>>;

/**
 * Minimal YAML parser for the collector config structure.
 *
 * Handles top-level sections with indented scalar values, inline `[a, b]`
 * lists and `- item` lists under a key. Numbers stay strings; the schema
 * coerces them.
 */
export function parseSimpleYaml(content: string): YamlSections {
  const result: YamlSections = {};
  let section: Record<string, unknown> | null = null;
  let lastKey = '';

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) continue;

    // Top-level key (no leading whitespace)
    if (!line.startsWith(' ') && !line.startsWith('\t') && line.includes(':')) {
      const name = line.slice(0, line.indexOf(':')).trim();
      section = {};
      result[name] = section;
      lastKey = '';
      continue;
    }

    if (!section) continue;

    if (trimmed.startsWith('- ')) {
      if (!lastKey) continue;
      const current = section[lastKey];
      const list = Array.isArray(current) ? current : [];
      list.push(parseScalar(trimmed.slice(2).trim()));
      section[lastKey] = list;
      continue;
    }

    const colonIdx = trimmed.indexOf(':');
    if (colonIdx === -1) continue;
    lastKey = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();
    // `key:` with nothing after it opens a `- item` list
    section[lastKey] = value === '' ? [] : parseScalar(value);
  }

  return result;
}

function parseScalar(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value === '""' || value === "''") return '';
  if (value.startsWith('[') && value.endsWith(']')) {
    const inner = value.slice(1, -1).trim();
    return inner === '' ? [] : inner.split(',').map((item) => parseScalar(item.trim()));
  }
  if (
    value.length >= 2
    && ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'")))
  ) {
    return value.slice(1, -1);
  }
  return value;
}

/** Environment variables that override file values. */
function applyEnv(sections: YamlSections, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const http = { ...sections['http'] };
  const redis = { ...sections['redis'] };
  const log = { ...sections['log'] };
  if (env['HOST']) http['host'] = env['HOST'];
  if (env['PORT']) http['port'] = env['PORT'];
  if (env['REDIS_URL']) redis['url'] = env['REDIS_URL'];
  if (env['LOG_LEVEL']) log['level'] = env['LOG_LEVEL'];

  return { ...sections, http, redis, log };
}

function checkCrossField(raw: RawConfig): z.ZodIssue[] {
  const issues: z.ZodIssue[] = [];

  for (const destination of ['good', 'bad'] as const) {
    const limits = sinkLimits(raw[destination]);
    if (limits.maxRecordBytes > limits.maxBatchBytes) {
      issues.push({
        code: z.ZodIssueCode.custom,
        path: [destination, 'max_record_bytes'],
        message: `max_record_bytes (${limits.maxRecordBytes}) must not exceed max_batch_bytes (${limits.maxBatchBytes})`,
      });
    }
  }

  const { backoff } = raw;
  if (backoff.multiplier < 1 + backoff.jitter) {
    issues.push({
      code: z.ZodIssueCode.custom,
      path: ['backoff', 'multiplier'],
      message: `multiplier (${backoff.multiplier}) must be at least 1 + jitter (${1 + backoff.jitter}) so delays never decrease`,
    });
  }
  if (backoff.max_delay_ms < backoff.initial_delay_ms) {
    issues.push({
      code: z.ZodIssueCode.custom,
      path: ['backoff', 'max_delay_ms'],
      message: `max_delay_ms (${backoff.max_delay_ms}) must be at least initial_delay_ms (${backoff.initial_delay_ms})`,
    });
  }

  return issues;
}

function sinkLimits(section: RawSinkSection): { maxBatchBytes: number; maxBatchRecords: number; maxRecordBytes: number } {
  const defaults = DEFAULT_SINK_LIMITS[section.type];
  return {
    maxBatchBytes: section.max_batch_bytes ?? defaults.maxBatchBytes,
    maxBatchRecords: section.max_batch_records ?? defaults.maxBatchRecords,
    maxRecordBytes: section.max_record_bytes ?? defaults.maxRecordBytes,
  };
}

function toSinkConfig(section: RawSinkSection): SinkConfig {
  return {
    type: section.type,
    name: section.name,
    ...sinkLimits(section),
    timeLimitMs: section.time_limit_ms,
    streamMaxLen: section.stream_max_len,
  };
}

function toCollectorConfig(raw: RawConfig): CollectorConfig {
  return {
    logLevel: raw.log.level,
    http: { host: raw.http.host, port: raw.http.port },
    collector: {
      name: raw.collector.name,
      ipPartitionKey: raw.collector.ip_partition_key,
      redactHeaders: raw.collector.redact_headers.map((h) => h.toLowerCase()),
    },
    redis: { url: raw.redis.url, commandTimeoutMs: raw.redis.command_timeout_ms },
    good: toSinkConfig(raw.good),
    bad: toSinkConfig(raw.bad),
    buffer: { maxBufferedBytes: raw.buffer.max_buffered_bytes },
    backoff: {
      initialDelayMs: raw.backoff.initial_delay_ms,
      multiplier: raw.backoff.multiplier,
      jitter: raw.backoff.jitter,
      maxDelayMs: raw.backoff.max_delay_ms,
      totalBackoffMs: raw.backoff.total_backoff_ms,
      maxRetries: raw.backoff.max_retries,
      ...(raw.backoff.seed !== undefined ? { seed: raw.backoff.seed } : {}),
    },
    outage: {
      unhealthyThreshold: raw.outage.unhealthy_threshold,
      probeIntervalMs: raw.outage.probe_interval_ms,
      startupCheck: raw.outage.startup_check,
    },
    shutdown: {
      drainTimeoutMs: raw.shutdown.drain_timeout_ms,
      preTerminationMs: raw.shutdown.pre_termination_ms,
    },
    warmup: {
      enabled: raw.warmup.enabled,
      maxAttempts: raw.warmup.max_attempts,
      intervalMs: raw.warmup.interval_ms,
    },
  };
}

/**
 * Validates parsed sections plus environment overrides.
 *
 * Missing keys get defaults; sink limits default per sink type.
 */
export function parseConfig(sections: YamlSections, env: NodeJS.ProcessEnv = {}): CollectorConfig {
  const result = rawConfigSchema.safeParse(applyEnv(sections, env));
  if (!result.success) {
    const summary = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${summary}`, result.error.issues);
  }

  const issues = checkCrossField(result.data);
  if (issues.length > 0) {
    throw new ConfigError(`Invalid configuration: ${issues.map((i) => i.message).join('; ')}`, issues);
  }

  return toCollectorConfig(result.data);
}

/**
 * Loads collector configuration from the YAML file.
 *
 * The path comes from `CONFIG_PATH`, else `config/collector.yaml` under the
 * working directory. A missing file means defaults plus environment.
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): CollectorConfig {
  const filePath = configPath ?? env['CONFIG_PATH'] ?? resolve(process.cwd(), 'config', 'collector.yaml');

  let sections: YamlSections = {};
  if (existsSync(filePath)) {
    try {
      sections = parseSimpleYaml(readFileSync(filePath, 'utf-8'));
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Cannot read configuration file ${filePath}: ${reason}`);
    }
  }

  return parseConfig(sections, env);
}
