import { InputError } from "../workflow/errors";

export interface GenerationRequest {
  readonly context: string;
  readonly examples: string;
  readonly count: number;
}

export interface GenerationResult {
  readonly platformName: string;
  readonly count: number;
  readonly body: string;
  readonly producerName: string;
}

export function createGenerationRequest(input: {
  context: string;
  examples: string;
  count: number;
}): GenerationRequest {
  const context = input.context.trim();
  if (!context) {
    throw new InputError("Context cannot be empty");
  }

  if (!Number.isInteger(input.count) || input.count < 1) {
    throw new InputError("Post count must be a positive integer");
  }

  return Object.freeze({
    context,
    examples: input.examples.trim(),
    count: input.count,
  });
}
