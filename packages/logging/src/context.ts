import {AsyncLocalStorage} from 'node:async_hooks';

import {z} from 'zod';

export const LogContextSchema = z
  .object({
    connection_id: z.string().min(1).max(128).optional(),
    remote_address: z.string().min(1).optional(),
    remote_port: z.number().int().gte(0).lte(65_535).optional(),
    method: z.string().min(1).optional(),
    route: z.string().min(1).optional()
  })
  .strict();

export type LogContext = z.infer<typeof LogContextSchema>;

const storage = new AsyncLocalStorage<LogContext>();

/** Runs `operation` with `fields` layered over the enclosing scope's context, if any. */
export const runWithLogContext = <T>(fields: LogContext, operation: () => T): T =>
  storage.run({...storage.getStore(), ...LogContextSchema.parse(fields)}, operation);

export const getLogContext = (): LogContext | undefined => storage.getStore();

/** Adds fields to the current scope in place. Outside any scope this is a no-op returning undefined. */
export const setLogContextFields = (fields: LogContext): LogContext | undefined => {
  const current = storage.getStore();
  if (current) {
    Object.assign(current, LogContextSchema.parse(fields));
  }

  return current;
};
