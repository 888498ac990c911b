/**
 * Zod validation schemas for check documents and connection options
 *
 * @license MIT
 */

import { z } from 'zod';
import type { ConnectionTarget } from '../types/connector.js';
import type { CheckDefinition, CheckDocument } from '../types.js';

// ==============================================
// Check Document Schemas
// ==============================================

/**
 * One entry of the `validations` list
 */
export const CheckDefinitionSchema = z.object({
  name: z.string().trim().min(1, 'Check name cannot be empty'),
  query: z.string().refine(query => query.trim().length > 0, 'Check query cannot be empty'),
  description: z.string().nullish(),
  warning_message: z.string().nullish(),
}).transform((raw): CheckDefinition => ({
  name: raw.name,
  query: raw.query,
  ...(raw.description != null ? { description: raw.description } : {}),
  ...(raw.warning_message != null ? { warningMessage: raw.warning_message } : {}),
}));

/**
 * Schema/owner name in the exclusion list
 */
export const OwnerNameSchema = z.string().min(1, 'Owner name cannot be empty');

export const CheckDocumentSchema = z.object({
  validations: z.array(CheckDefinitionSchema),
  owner_exclude_list: z.array(OwnerNameSchema).nullish(),
}).transform((doc): CheckDocument => ({
  checks: doc.validations,
  ownerExcludeList: doc.owner_exclude_list ?? [],
}));

// ==============================================
// Connection Option Schemas
// ==============================================

/**
 * Schema for validating hostnames and IP addresses
 */
export const HostnameSchema = z.string()
  .min(1, 'Host is required')
  .max(255, 'Host name too long (max 255 characters)')
  .regex(/^[a-zA-Z0-9\-\.]+$/, 'Invalid host name format');

/**
 * Port numbers arrive from the command line as strings
 */
export const PortSchema = z.coerce.number()
  .int('Port must be an integer')
  .min(1, 'Port must be at least 1')
  .max(65535, 'Port must be at most 65535');

export const ServiceNameSchema = z.string()
  .min(1, 'Service name is required')
  .max(128, 'Service name too long (max 128 characters)')
  .regex(/^[a-zA-Z0-9_\-\.]+$/, 'Service name contains invalid characters');

export const ProtocolSchema = z.enum(['tcp', 'tcps']);

export const AliasSchema = z.string()
  .min(1, 'Alias is required')
  .max(255, 'Alias too long (max 255 characters)');

function addIssues(ctx: z.RefinementCtx, error: z.ZodError, path?: (string | number)[]): void {
  for (const issue of error.issues) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: issue.message,
      path: path ?? issue.path,
    });
  }
}

/**
 * Raw connection options as given on the command line
 */
export const ConnectionOptionsSchema = z.object({
  host: z.string().optional(),
  port: z.union([z.string(), z.number()]).optional(),
  service: z.string().optional(),
  protocol: z.string().optional(),
  tns: z.string().optional(),
  tnsPath: z.string().optional(),
}).transform((options, ctx): ConnectionTarget => {
  const usesAlias = Boolean(options.tns);
  const usesDirect = Boolean(options.host || options.service);

  if (usesAlias && usesDirect) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Provide either --tns or --host/--port/--service, not both',
      path: ['tns'],
    });
    return z.NEVER;
  }

  if (!usesAlias && !usesDirect) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Provide either --tns or --host, --port and --service',
    });
    return z.NEVER;
  }

  if (!usesAlias && options.tnsPath) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: '--tns-path applies only to --tns connections',
      path: ['tnsPath'],
    });
    return z.NEVER;
  }

  if (usesAlias) {
    const alias = AliasSchema.safeParse(options.tns);
    if (!alias.success) {
      addIssues(ctx, alias.error, ['tns']);
      return z.NEVER;
    }
    return {
      kind: 'alias',
      alias: alias.data,
      ...(options.tnsPath ? { configDir: options.tnsPath } : {}),
    };
  }

  const direct = z.object({
    host: HostnameSchema,
    port: PortSchema.default(1521),
    service: ServiceNameSchema,
    protocol: ProtocolSchema.default('tcp'),
  }).safeParse({
    host: options.host,
    port: options.port,
    service: options.service,
    protocol: options.protocol,
  });

  if (!direct.success) {
    addIssues(ctx, direct.error);
    return z.NEVER;
  }

  return { kind: 'direct', ...direct.data };
});

export type ConnectionOptionsInput = z.input<typeof ConnectionOptionsSchema>;

export const schemas = {
  CheckDefinitionSchema,
  CheckDocumentSchema,
  OwnerNameSchema,
  HostnameSchema,
  PortSchema,
  ServiceNameSchema,
  ProtocolSchema,
  AliasSchema,
  ConnectionOptionsSchema,
} as const;
