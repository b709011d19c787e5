/**
 * Base error class for all Huddle errors.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class HuddleError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'HuddleError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown at setup time when participants, tools or the backend are misconfigured. */
export class ConfigurationError extends HuddleError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIGURATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ConfigurationError';
  }
}

/** Thrown when input validation (Zod) fails. */
export class ValidationError extends HuddleError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

/** Thrown when an LLM provider call fails. */
export class ProviderError extends HuddleError {
  constructor(provider: string, message: string, cause?: Error) {
    super({
      message: `LLM provider "${provider}" error: ${message}`,
      code: 'PROVIDER_ERROR',
      statusCode: 502,
      cause,
      context: { provider },
    });
    this.name = 'ProviderError';
  }
}

/** Thrown when a classifier reply is not a well-formed verdict. */
export class ClassifierParseError extends HuddleError {
  constructor(classifier: string, rawOutput: string, cause?: Error) {
    super({
      message: `${classifier} classifier returned malformed output`,
      code: 'CLASSIFIER_PARSE_ERROR',
      statusCode: 502,
      cause,
      context: { classifier, rawOutput },
    });
    this.name = 'ClassifierParseError';
  }
}

/** Thrown when the termination verdict is neither "yes" nor "no". */
export class TerminationContractViolation extends HuddleError {
  constructor(verdict: string) {
    super({
      message: `Termination verdict must be "yes" or "no", got "${verdict}"`,
      code: 'TERMINATION_CONTRACT_VIOLATION',
      statusCode: 502,
      context: { verdict },
    });
    this.name = 'TerminationContractViolation';
  }
}

/** Thrown when an agent's model or tool call fails while producing its turn. */
export class AgentExecutionError extends HuddleError {
  constructor(agentName: string, message: string, cause?: Error) {
    super({
      message: `Agent "${agentName}" failed: ${message}`,
      code: 'AGENT_EXECUTION_ERROR',
      statusCode: 502,
      cause,
      context: { agentName },
    });
    this.name = 'AgentExecutionError';
  }
}

/** Thrown when the LLM requests a tool that does not exist in the agent's registry. */
export class ToolNotFoundError extends HuddleError {
  constructor(toolId: string, availableTools: string[]) {
    super({
      message: `LLM requested non-existent tool "${toolId}"`,
      code: 'TOOL_NOT_FOUND',
      statusCode: 400,
      context: { toolId, availableTools },
    });
    this.name = 'ToolNotFoundError';
  }
}

/** Thrown when a tool's execute() fails at runtime. */
export class ToolExecutionError extends HuddleError {
  constructor(toolId: string, message: string, cause?: Error) {
    super({
      message: `Tool "${toolId}" execution failed: ${message}`,
      code: 'TOOL_EXECUTION_ERROR',
      statusCode: 500,
      cause,
      context: { toolId },
    });
    this.name = 'ToolExecutionError';
  }
}

/** Thrown when a session is used in a way its lifecycle does not allow. */
export class SessionError extends HuddleError {
  constructor(message: string, conversationId: string) {
    super({
      message,
      code: 'SESSION_ERROR',
      statusCode: 409,
      context: { conversationId },
    });
    this.name = 'SessionError';
  }
}

/** Returned when the host aborts a round at a suspension point. */
export class SessionAbortedError extends HuddleError {
  constructor(conversationId: string) {
    super({
      message: `Session "${conversationId}" was aborted`,
      code: 'SESSION_ABORTED',
      statusCode: 499,
      context: { conversationId },
    });
    this.name = 'SessionAbortedError';
  }
}
