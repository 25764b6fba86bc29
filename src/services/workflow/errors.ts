export type WorkflowErrorCode =
  | "CONFIGURATION_ERROR"
  | "INPUT_ERROR"
  | "REMOTE_CALL_FAILED";

export class WorkflowError extends Error {
  constructor(
    public readonly code: WorkflowErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "WorkflowError";
  }
}

export class ConfigurationError extends WorkflowError {
  constructor(message: string) {
    super("CONFIGURATION_ERROR", message);
    this.name = "ConfigurationError";
  }
}

export class InputError extends WorkflowError {
  constructor(message: string) {
    super("INPUT_ERROR", message);
    this.name = "InputError";
  }
}

export type RemoteService = "llm" | "apify";

export class RemoteCallError extends WorkflowError {
  constructor(
    public readonly service: RemoteService,
    message: string,
  ) {
    super("REMOTE_CALL_FAILED", message);
    this.name = "RemoteCallError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim()) {
    return error.message;
  }

  const text = String(error ?? "").trim();
  return text || "Unknown error";
}
