import { BadRequestException } from '@nestjs/common';

// Malformed tool argument or user input. Maps to HTTP 400; never retried.
export class InputValidationError extends BadRequestException {
  constructor(message: string) {
    super(message);
    this.name = 'InputValidationError';
  }
}

// The agent runtime call failed. Users only ever see GENERIC_FAILURE_REPLY.
export class RuntimeCallError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'RuntimeCallError';
  }
}

export const GENERIC_FAILURE_REPLY =
  'Sorry, something went wrong while processing your request. Please try again.';

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
