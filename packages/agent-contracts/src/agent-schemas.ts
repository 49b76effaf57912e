/**
 * Zod Schemas for Runner Configuration Validation
 *
 * Provides runtime validation for run options, agent options and persisted
 * session items (which may come from YAML files or a database).
 */

import { z } from 'zod';

/**
 * Message schema (session items are validated against it on load)
 */
export const MessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string(),
});

/**
 * Tool input schema validator
 */
export const ToolInputSchemaSchema = z.object({
  type: z.literal('object'),
  properties: z.record(z.unknown()),
  required: z.array(z.string()).optional(),
  additionalProperties: z.boolean().optional(),
  description: z.string().optional(),
});

/**
 * pino log levels
 */
export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

/**
 * Serialisable part of the run configuration
 */
export const RunConfigSchema = z.object({
  maxTurns: z.number().int().positive().default(100),
  hookFailPolicy: z.enum(['fail-open', 'fail-closed']).default('fail-closed'),
  /** 0 = no timeout */
  hookTimeoutMs: z.number().int().nonnegative().default(0),
  /** 0 = no timeout */
  toolTimeoutMs: z.number().int().nonnegative().default(0),
  logLevel: LogLevelSchema.optional(),
});

/**
 * Plain fields of an agent profile
 */
export const AgentOptionsSchema = z.object({
  name: z.string().trim().min(1, 'Agent name must not be empty'),
  instructions: z.string().default(''),
  model: z.string().min(1).default('gpt-4'),
  outputSchema: z.record(z.unknown()).optional(),
  outputName: z.string().min(1).optional(),
  parallelToolCalls: z.boolean().default(true),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type HookFailPolicy = RunConfigValues['hookFailPolicy'];
export type RunConfigInput = z.input<typeof RunConfigSchema>;
export type RunConfigValues = z.output<typeof RunConfigSchema>;
export type AgentOptionsInput = z.input<typeof AgentOptionsSchema>;
export type AgentOptionsValues = z.output<typeof AgentOptionsSchema>;

/**
 * Format zod issues as "  • path: message" lines
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `  • ${path}: ${issue.message}` : `  • ${issue.message}`;
    })
    .join('\n');
}
