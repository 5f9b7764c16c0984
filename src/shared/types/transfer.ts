export type TransferFailureKind = 'transport' | 'protocol' | 'application' | 'file-system';

export type ProtocolErrorCode =
  | 'INVALID_TAG'
  | 'UNKNOWN_TAG'
  | 'FRAME_TOO_LARGE'
  | 'INVALID_FILE_INFO'
  | 'UNEXPECTED_MESSAGE';

export interface TransferFailure {
  kind: TransferFailureKind;
  message: string;
  code?: ProtocolErrorCode; // set on protocol failures
  cause?: unknown;
}

export interface FailedResult {
  success: false;
  failure: TransferFailure;
}

export type Result<T> = { success: true; value: T } | FailedResult;

export type StatusReporter = (message: string) => void;

export interface SendSummary {
  sessionId: string;
  filePath: string;
  fileName: string;
  bytesSent: number;
  message: string;
}

export interface BatchSendResult {
  filePath: string;
  result: Result<SendSummary>;
}

export interface ReceiveSummary {
  sessionId: string;
  fileName: string;
  destinationPath: string;
  bytesReceived: number;
  declaredSize: number;
  truncated: boolean;
}

export type ReceiverState = 'AWAIT_INFO' | 'READY' | 'RECEIVING' | 'COMPLETE' | 'FAILED';

export interface TransferSession {
  sessionId: string;
  remoteAddress: string;
  declaredSize: number;
  bytesTransferred: number;
  destinationPath?: string;
  state: ReceiverState;
}
