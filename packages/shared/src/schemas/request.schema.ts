import { z } from 'zod';
import {
  CHECK_MODES,
  DEFAULT_COMMUNITY,
  DEFAULT_SNMP_PORT,
  DEFAULT_SNMP_VERSION,
  DEFAULT_TIMEOUT,
  INTERFACE_MODES,
} from '../constants.js';
import { parseDuration } from '../utils/parser.js';

export const checkModeSchema = z.enum(CHECK_MODES, {
  errorMap: (_issue, ctx) => ({
    message: `unrecognized mode ${JSON.stringify(ctx.data)}; expected one of: ${CHECK_MODES.join(', ')}`,
  }),
});

const durationSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  try {
    const ms = parseDuration(value);
    if (ms <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `timeout must be positive: ${value}` });
      return z.NEVER;
    }
    return ms;
  } catch (err) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: err instanceof Error ? err.message : String(err),
    });
    return z.NEVER;
  }
});

export const checkRequestSchema = z
  .object({
    target: z.string().min(1, 'target host is required'),
    community: z.string().min(1).default(DEFAULT_COMMUNITY),
    mode: checkModeSchema,
    interfaceName: z.string().min(1).optional(),
    port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_SNMP_PORT),
    timeout: durationSchema.default(DEFAULT_TIMEOUT),
    version: z.enum(['1', '2c']).default(DEFAULT_SNMP_VERSION),
  })
  .superRefine((request, ctx) => {
    if (INTERFACE_MODES.includes(request.mode) && !request.interfaceName) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `mode ${request.mode} requires an interface name`,
        path: ['interfaceName'],
      });
    }
  })
  .transform(({ timeout, ...rest }) => ({ ...rest, timeoutMs: timeout }));

/** Invocation fields as they arrive from the command line, before validation. */
export interface CheckRequestFields {
  target: string;
  community?: string;
  mode: string;
  interfaceName?: string;
  port?: number | string;
  timeout?: number | string;
  version?: string;
}
