export type TtsErrorCode = 'invalid_request' | 'model_unavailable' | 'synthesis_failed';

/**
 * Caller-facing failures. Only these reach the HTTP layer with their message
 * as `detail`; anything else is reported as an internal error.
 */
export class TtsError extends Error {
  readonly code: TtsErrorCode;
  readonly status: number;

  constructor(code: TtsErrorCode, status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class InvalidRequestError extends TtsError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('invalid_request', 400, message);
    this.field = field;
  }
}

export type ModelUnavailableReason = 'not_found' | 'not_allowed' | 'capacity' | 'load_failed';

const MODEL_UNAVAILABLE_STATUS: Record<ModelUnavailableReason, number> = {
  not_found: 404,
  not_allowed: 404,
  capacity: 503,
  load_failed: 500,
};

export class ModelUnavailableError extends TtsError {
  readonly modelId: string;
  readonly reason: ModelUnavailableReason;

  constructor(modelId: string, reason: ModelUnavailableReason, message: string, options?: { cause?: unknown }) {
    super('model_unavailable', MODEL_UNAVAILABLE_STATUS[reason], message, options);
    this.modelId = modelId;
    this.reason = reason;
  }
}

export class SynthesisFailedError extends TtsError {
  readonly modelId: string;

  constructor(modelId: string, message: string, options?: { cause?: unknown }) {
    super('synthesis_failed', 500, message, options);
    this.modelId = modelId;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
