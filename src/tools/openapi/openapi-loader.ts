/**
 * OpenAPI tool loader: exposes each operation of an OpenAPI 3 document
 * (JSON) as a tool. Requests carry the headers supplied by the session,
 * time out after the configured limit, and follow the session's abort signal.
 */
import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { ConfigurationError, ToolExecutionError } from '@/core/errors.js';
import type { HuddleError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { OpenApiToolLoader, OpenApiToolSource } from '../loader.js';
import type { ExecutableTool, ToolContext, ToolResult } from '../types.js';

// ─── Document Schema ────────────────────────────────────────────

const HTTP_METHODS = ['get', 'put', 'post', 'delete', 'patch'] as const;
type HttpMethod = (typeof HTTP_METHODS)[number];

const jsonSchemaObject = z.record(z.unknown());

const parameterSchema = z.object({
  name: z.string().min(1),
  in: z.enum(['path', 'query', 'header', 'cookie']),
  required: z.boolean().optional(),
  description: z.string().optional(),
  schema: jsonSchemaObject.optional(),
});

const operationSchema = z.object({
  operationId: z.string().min(1).optional(),
  summary: z.string().optional(),
  description: z.string().optional(),
  parameters: z.array(parameterSchema).optional(),
  requestBody: z
    .object({
      required: z.boolean().optional(),
      content: z.record(z.object({ schema: jsonSchemaObject.optional() })),
    })
    .optional(),
});

const documentSchema = z.object({
  servers: z.array(z.object({ url: z.string() })).optional(),
  paths: z.record(z.record(z.unknown())),
});

type Operation = z.infer<typeof operationSchema>;
type Parameter = z.infer<typeof parameterSchema>;

// ─── Options ────────────────────────────────────────────────────

export interface OpenApiLoaderDeps {
  /** Reads the document text. Defaults to the file system. */
  readDocument?: (path: string) => Promise<string>;
  fetchFn?: typeof fetch;
}

// ─── Helpers ────────────────────────────────────────────────────

/** Provider function names allow letters, digits, `_` and `-`, up to 64 chars. */
function toToolId(prefix: string, operationId: string): string {
  return `${prefix}-${operationId}`.replace(/[^A-Za-z0-9_-]/g, '_').slice(0, 64);
}

function buildParametersSchema(operation: Operation): Record<string, unknown> {
  const properties: Record<string, unknown> = {};
  const required: string[] = [];

  for (const param of operation.parameters ?? []) {
    if (param.in === 'cookie') continue;
    properties[param.name] = {
      ...(param.schema ?? { type: 'string' }),
      ...(param.description ? { description: param.description } : {}),
    };
    if (param.required === true || param.in === 'path') required.push(param.name);
  }

  const bodySchema = operation.requestBody?.content['application/json']?.schema;
  if (bodySchema) {
    properties['body'] = bodySchema;
    if (operation.requestBody?.required === true) required.push('body');
  }

  return { type: 'object', properties, required };
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}

// ─── Tool Factory ───────────────────────────────────────────────

function createOperationTool(params: {
  source: OpenApiToolSource;
  baseUrl: string;
  pathTemplate: string;
  method: HttpMethod;
  operation: Operation & { operationId: string };
  fetchFn: typeof fetch;
}): ExecutableTool {
  const { source, baseUrl, pathTemplate, method, operation, fetchFn } = params;
  const { timeoutMs, debugLogging } = source.options;
  const logger = source.context.logger;
  const id = toToolId(source.name, operation.operationId);
  const inputSchema = z.record(z.unknown());
  const parameters: Parameter[] = operation.parameters ?? [];

  return {
    id,
    description:
      operation.description ?? operation.summary ?? `${method.toUpperCase()} ${pathTemplate}`,
    inputSchema,
    parametersJsonSchema: buildParametersSchema(operation),

    async execute(input: unknown, context: ToolContext): Promise<Result<ToolResult, HuddleError>> {
      const startTime = Date.now();

      try {
        const args = inputSchema.parse(input);
        const path = pathTemplate.replace(/\{([^}]+)\}/g, (_match, name: string) =>
          encodeURIComponent(String(args[name] ?? '')),
        );
        const url = new URL(`${baseUrl.replace(/\/$/, '')}${path}`);
        const headers: Record<string, string> = { accept: 'application/json', ...source.headers() };

        for (const param of parameters) {
          const value = args[param.name];
          if (value === undefined) continue;
          if (param.in === 'query') url.searchParams.set(param.name, String(value));
          if (param.in === 'header') headers[param.name] = String(value);
        }

        const init: RequestInit = {
          method: method.toUpperCase(),
          headers,
          signal: context.abortSignal
            ? AbortSignal.any([context.abortSignal, AbortSignal.timeout(timeoutMs)])
            : AbortSignal.timeout(timeoutMs),
        };
        if (args['body'] !== undefined) {
          headers['content-type'] = 'application/json';
          init.body = JSON.stringify(args['body']);
        }

        if (debugLogging) {
          logger.debug('OpenAPI request', {
            component: 'openapi-tool',
            toolId: id,
            method: init.method,
            url: url.toString(),
            participant: context.participantName,
          });
        }

        const response = await fetchFn(url, init);
        const body = await readBody(response);
        const durationMs = Date.now() - startTime;

        if (debugLogging) {
          logger.debug('OpenAPI response', {
            component: 'openapi-tool',
            toolId: id,
            status: response.status,
            durationMs,
          });
        }

        return ok({
          success: response.ok,
          output: { status: response.status, body },
          ...(response.ok ? {} : { error: `HTTP ${String(response.status)}` }),
          durationMs,
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn('OpenAPI request failed', {
          component: 'openapi-tool',
          toolId: id,
          error: message,
        });
        return err(new ToolExecutionError(id, message, error instanceof Error ? error : undefined));
      }
    },
  };
}

// ─── Loader ─────────────────────────────────────────────────────

/** Create a loader that reads JSON OpenAPI documents. */
export function createOpenApiToolLoader(deps?: OpenApiLoaderDeps): OpenApiToolLoader {
  const readDocument = deps?.readDocument ?? ((path: string) => readFile(path, 'utf-8'));
  const fetchFn = deps?.fetchFn ?? fetch;

  return {
    async load(source: OpenApiToolSource): Promise<ExecutableTool[]> {
      const { openapiDocumentPath, serverUrlOverride } = source.options;

      let text: string;
      try {
        text = await readDocument(openapiDocumentPath);
      } catch (error) {
        throw new ConfigurationError(`Cannot read OpenAPI document: ${openapiDocumentPath}`, {
          tool: source.name,
          errorMessage: error instanceof Error ? error.message : String(error),
        });
      }

      let raw: unknown;
      try {
        raw = JSON.parse(text);
      } catch {
        throw new ConfigurationError(`OpenAPI document is not valid JSON: ${openapiDocumentPath}`, {
          tool: source.name,
        });
      }

      const parsed = documentSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ConfigurationError(`Invalid OpenAPI document: ${openapiDocumentPath}`, {
          tool: source.name,
          issues: parsed.error.issues.map((issue) => issue.message),
        });
      }

      const baseUrl = serverUrlOverride ?? parsed.data.servers?.[0]?.url;
      if (!baseUrl) {
        throw new ConfigurationError(`OpenAPI document declares no server: ${openapiDocumentPath}`, {
          tool: source.name,
        });
      }
      if (!URL.canParse(baseUrl)) {
        throw new ConfigurationError(`OpenAPI server URL is not absolute: ${baseUrl}`, {
          tool: source.name,
          hint: 'Set serverUrlOverride to an absolute URL',
        });
      }

      const tools: ExecutableTool[] = [];
      for (const [pathTemplate, pathItem] of Object.entries(parsed.data.paths)) {
        for (const method of HTTP_METHODS) {
          if (pathItem[method] === undefined) continue;
          const operation = operationSchema.safeParse(pathItem[method]);
          if (!operation.success || !operation.data.operationId) {
            source.context.logger.warn('Skipping OpenAPI operation without operationId', {
              component: 'openapi-loader',
              tool: source.name,
              method,
              path: pathTemplate,
            });
            continue;
          }
          tools.push(
            createOperationTool({
              source,
              baseUrl,
              pathTemplate,
              method,
              operation: { ...operation.data, operationId: operation.data.operationId },
              fetchFn,
            }),
          );
        }
      }

      source.context.logger.info('Loaded OpenAPI tools', {
        component: 'openapi-loader',
        tool: source.name,
        participant: source.context.participantName,
        operations: tools.map((t) => t.id),
      });

      return tools;
    },
  };
}
