import type {Writable} from 'node:stream';

import {z} from 'zod';

import {getLogContext} from './context';
import {describeError, sanitizeForLog} from './redaction';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EmittableLogLevelSchema = LogLevelSchema.exclude(['silent']);
type EmittableLogLevel = z.infer<typeof EmittableLogLevelSchema>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 90
};

// Dotted lowercase names such as `request.completed`.
const EventNameSchema = z.string().regex(/^[a-z0-9_]+(?:\.[a-z0-9_]+)+$/u);

const StatusCodeSchema = z.number().int().gte(100).lte(599);
const MetadataSchema = z.record(z.string(), z.unknown());

export const LogEventInputSchema = z
  .object({
    level: EmittableLogLevelSchema,
    event: EventNameSchema,
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    connection_id: z.string().min(1).max(128).optional(),
    reason_code: z.string().min(1).optional(),
    status_code: StatusCodeSchema.optional(),
    duration_ms: z.number().int().gte(0).optional(),
    error: z.unknown().optional(),
    metadata: MetadataSchema.optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

export const LogEventSchema = z
  .object({
    ts: z.iso.datetime(),
    level: EmittableLogLevelSchema,
    service: z.string().min(1),
    env: z.string().min(1),
    event: EventNameSchema,
    component: z.string().min(1),
    message: z.string().min(1).optional(),
    connection_id: z.string().min(1),
    remote_address: z.string().min(1).optional(),
    remote_port: z.number().int().optional(),
    method: z.string().min(1).optional(),
    route: z.string().min(1).optional(),
    status_code: StatusCodeSchema.optional(),
    duration_ms: z.number().int().gte(0).optional(),
    reason_code: z.string().min(1).optional(),
    error: MetadataSchema.optional(),
    metadata: MetadataSchema
  })
  .strict();

export type LogEvent = z.infer<typeof LogEventSchema>;

export type StructuredLogWriter = {
  stdout: Pick<Writable, 'write'>;
  stderr: Pick<Writable, 'write'>;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

type LevelMethod = (input: Omit<LogEventInput, 'level'>) => void;

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
  debug: LevelMethod;
  info: LevelMethod;
  warn: LevelMethod;
  error: LevelMethod;
  fatal: LevelMethod;
};

// Problems go to stderr so they survive stdout being piped elsewhere.
const streamFor = (level: EmittableLogLevel, writer: StructuredLogWriter) =>
  LEVEL_ORDER[level] >= LEVEL_ORDER.error ? writer.stderr : writer.stdout;

const buildEnvelope = ({
  input,
  service,
  env,
  now,
  extraSensitiveKeys
}: {
  input: LogEventInput;
  service: string;
  env: string;
  now: () => Date;
  extraSensitiveKeys: string[];
}): LogEvent => {
  const context = getLogContext();
  const redact = (value: unknown) => MetadataSchema.parse(sanitizeForLog({value, extraSensitiveKeys}));

  return LogEventSchema.parse({
    ts: now().toISOString(),
    level: input.level,
    service,
    env,
    event: input.event,
    component: input.component,
    message: input.message,
    connection_id: input.connection_id ?? context?.connection_id ?? 'n/a',
    remote_address: context?.remote_address,
    remote_port: context?.remote_port,
    method: context?.method,
    route: context?.route,
    status_code: input.status_code,
    duration_ms: input.duration_ms,
    reason_code: input.reason_code,
    error: input.error === undefined ? undefined : redact(describeError(input.error)),
    metadata: redact(input.metadata ?? {})
  });
};

export const createStructuredLogger = (options: StructuredLoggerOptions): StructuredLogger => {
  const threshold = LEVEL_ORDER[LogLevelSchema.parse(options.level)];
  const service = z.string().min(1).parse(options.service);
  const env = z.string().min(1).parse(options.env);
  const writer = options.writer ?? {stdout: process.stdout, stderr: process.stderr};
  const now = options.now ?? (() => new Date());
  const extraSensitiveKeys = options.extraSensitiveKeys ?? [];

  const log = (rawInput: LogEventInput) => {
    const input = LogEventInputSchema.parse(rawInput);
    if (LEVEL_ORDER[input.level] < threshold) {
      return;
    }

    try {
      const envelope = buildEnvelope({input, service, env, now, extraSensitiveKeys});
      streamFor(input.level, writer).write(`${JSON.stringify(envelope)}\n`);
    } catch {
      // Logging never throws into the caller.
    }
  };

  return {
    log,
    debug: input => log({...input, level: 'debug'}),
    info: input => log({...input, level: 'info'}),
    warn: input => log({...input, level: 'warn'}),
    error: input => log({...input, level: 'error'}),
    fatal: input => log({...input, level: 'fatal'})
  };
};

export const createNoopLogger = (): StructuredLogger => {
  const ignore = () => undefined;
  return {log: ignore, debug: ignore, info: ignore, warn: ignore, error: ignore, fatal: ignore};
};
