import {
  FailedResult,
  ProtocolErrorCode,
  Result,
  TransferFailure,
  TransferFailureKind,
} from '../../shared/types/transfer';

export function ok<T>(value: T): Result<T> {
  return { success: true, value };
}

export function fail(kind: TransferFailureKind, message: string, cause?: unknown): FailedResult {
  const failure: TransferFailure = { kind, message };
  if (cause !== undefined) {
    failure.cause = cause;
  }
  return { success: false, failure };
}

export function transportFailure(message: string, cause?: unknown): FailedResult {
  return fail('transport', message, cause);
}

export function protocolViolation(
  code: ProtocolErrorCode,
  message: string,
  cause?: unknown
): FailedResult {
  const result = fail('protocol', message, cause);
  result.failure.code = code;
  return result;
}

export function applicationError(message: string): FailedResult {
  return fail('application', message);
}

export function fileSystemFailure(message: string, cause?: unknown): FailedResult {
  return fail('file-system', message, cause);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function describeFailure(failure: TransferFailure): string {
  switch (failure.kind) {
    case 'transport':
      return `Connection error: ${failure.message}`;
    case 'protocol':
      return `Protocol error: ${failure.message}`;
    case 'application':
      return `Server error: ${failure.message}`;
    case 'file-system':
      return `File error: ${failure.message}`;
  }
}
