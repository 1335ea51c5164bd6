import { toErrorInfo, type ErrorCode, type ErrorEnvelope } from '@memobench/shared';

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  UNKNOWN_BACKEND: 400,
  PIPELINE_HALTED: 422,
};

/**
 * Map any thrown value to an HTTP status and error envelope
 */
export function toHttpError(error: unknown, correlationId: string): { status: number; body: ErrorEnvelope } {
  const info = toErrorInfo(error);
  const status = STATUS_BY_CODE[info.code] ?? 500;

  return {
    status,
    body: {
      error: {
        code: status === 500 ? 'internal_error' : info.code.toLowerCase(),
        message: status === 500 ? 'Benchmark run failed' : info.message,
        correlation_id: correlationId,
      },
    },
  };
}

export function invalidRequest(message: string, correlationId: string): ErrorEnvelope {
  return {
    error: {
      code: 'invalid_request',
      message,
      correlation_id: correlationId,
    },
  };
}
