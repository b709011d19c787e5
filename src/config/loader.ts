/**
 * Configuration loader: reads JSON config files, validates with Zod,
 * and resolves environment variable placeholders.
 */
import { readFile } from 'node:fs/promises';

import type { z } from 'zod';

import { ConfigurationError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import { huddleConfigFileSchema } from './schema.js';

// ─── Types ──────────────────────────────────────────────────────

/** A configuration file after env resolution and validation. */
export type HuddleConfigFile = z.infer<typeof huddleConfigFileSchema>;

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

/**
 * Recursively replaces strings of the exact form `${VAR_NAME}` with the
 * value of that environment variable.
 *
 * @throws ConfigurationError if a referenced environment variable is not defined
 */
export function resolveEnvVars(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    const varName = ENV_VAR_PATTERN.exec(obj)?.[1];
    if (varName !== undefined) {
      const value = env[varName];
      if (value === undefined) {
        throw new ConfigurationError(`Environment variable "${varName}" is not defined`, {
          variableName: varName,
        });
      }
      return value;
    }
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, env));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, env);
    }
    return result;
  }

  return obj;
}

// ─── Configuration Loader ───────────────────────────────────────

/**
 * Validates an already-parsed configuration object.
 * Env placeholders are resolved first.
 */
export function parseHuddleConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): Result<HuddleConfigFile, ConfigurationError> {
  let resolved: unknown;
  try {
    resolved = resolveEnvVars(raw, env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return err(error);
    }
    return err(
      new ConfigurationError('Failed to resolve environment variables', {
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  const validation = huddleConfigFileSchema.safeParse(resolved);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(new ConfigurationError('Configuration validation failed', { issues }));
  }

  return ok(validation.data);
}

/**
 * Loads and validates a configuration file.
 *
 * 1. Reads the JSON file from disk
 * 2. Parses the JSON content
 * 3. Resolves environment variable placeholders
 * 4. Validates against the Zod schema
 */
export async function loadHuddleConfig(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Result<HuddleConfigFile, ConfigurationError>> {
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const nodeError = error as NodeJS.ErrnoException;
    if (nodeError.code === 'ENOENT') {
      return err(
        new ConfigurationError(`Configuration file not found: ${filePath}`, {
          filePath,
          errorCode: 'ENOENT',
        }),
      );
    }
    return err(
      new ConfigurationError(`Failed to read configuration file: ${filePath}`, {
        filePath,
        errorCode: nodeError.code,
        errorMessage: nodeError.message,
      }),
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch {
    return err(new ConfigurationError('Invalid JSON in configuration file', { filePath }));
  }

  const result = parseHuddleConfig(parsed, env);
  if (!result.ok) {
    return err(
      new ConfigurationError(result.error.message, { ...result.error.context, filePath }),
    );
  }
  return result;
}
