/**
 * Zod schemas for validating configuration files.
 * These schemas mirror the TypeScript interfaces in core/types.ts
 * and config/types.ts, providing runtime validation.
 */
import { z } from 'zod';

// ─── LLM Provider Config ────────────────────────────────────────

/**
 * Schema for LLM provider configuration.
 * Validates provider type, model, and optional settings.
 */
export const llmProviderConfigSchema = z
  .object({
    provider: z.enum(['openai', 'azure-openai', 'anthropic', 'ollama']),
    model: z.string().min(1, 'Model identifier cannot be empty'),
    maxOutputTokens: z.number().int().positive().optional(),
    apiKeyEnvVar: z.string().min(1).optional(),
    baseUrl: z.string().url('Invalid base URL format').optional(),
    apiVersion: z.string().min(1).optional(),
  })
  .refine((data) => data.provider !== 'azure-openai' || data.baseUrl !== undefined, {
    message: 'azure-openai requires a "baseUrl" (the resource endpoint)',
    path: ['baseUrl'],
  });

// ─── Tool Config ────────────────────────────────────────────────

/**
 * Schema for a tool entry on a participant.
 * Only `name` and `type` are checked here; type-specific fields are
 * validated by the tool loader so that an unknown `type` is reported
 * as such instead of as a missing field.
 */
export const toolConfigSchema = z
  .object({
    name: z.string().min(1, 'Tool name cannot be empty'),
    type: z.string().min(1).optional(),
  })
  .passthrough();

/** Fields of an `openapi` tool entry. */
export const openApiToolOptionsSchema = z.object({
  openapiDocumentPath: z.string().min(1, 'openapiDocumentPath cannot be empty'),
  serverUrlOverride: z.string().url('Invalid server URL').optional(),
  timeoutMs: z.number().int().positive().default(600_000),
  debugLogging: z.boolean().default(false),
});

// ─── Participant Config ─────────────────────────────────────────

export const participantConfigSchema = z.object({
  name: z.string().min(1, 'Participant name cannot be empty'),
  description: z.string().min(1, 'Participant description cannot be empty'),
  instructions: z.string().optional(),
  facilitator: z.boolean().optional(),
  kind: z.enum(['chat', 'special', 'background']).optional(),
  temperature: z.number().min(0).max(2).optional(),
  tools: z.array(toolConfigSchema).optional(),
});

// ─── Orchestration Config ───────────────────────────────────────

export const orchestrationConfigSchema = z.object({
  maxIterations: z.number().int().positive('Max iterations must be a positive integer').optional(),
  seed: z.number().int().optional(),
  defaultAgentTemperature: z.number().min(0).max(2).optional(),
  maxToolRounds: z.number().int().positive('Max tool rounds must be a positive integer').optional(),
  supportsTemperature: z.boolean().optional(),
});

// ─── Config File ────────────────────────────────────────────────

/**
 * Schema for configuration files (JSON).
 * Participant-level rules (unique names, a single facilitator) are
 * enforced by the participant registry, which also guards programmatic use.
 */
export const huddleConfigFileSchema = z.object({
  model: llmProviderConfigSchema,
  orchestration: orchestrationConfigSchema.optional(),
  participants: z.array(participantConfigSchema).min(1, 'At least one participant is required'),
});

// ─── Inferred Types ─────────────────────────────────────────────

/** Inferred type from openApiToolOptionsSchema (defaults applied) */
export type OpenApiToolOptions = z.infer<typeof openApiToolOptionsSchema>;

/** Inferred type from participantConfigSchema */
export type ParticipantConfigInput = z.infer<typeof participantConfigSchema>;

/** Inferred type from huddleConfigFileSchema */
export type HuddleConfigFileInput = z.infer<typeof huddleConfigFileSchema>;
