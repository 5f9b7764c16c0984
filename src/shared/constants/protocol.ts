export const FRAME_TAG_LENGTH = 4;
export const FRAME_HEADER_SIZE = 8;

// Upper bound on a single frame's payload; larger declared lengths are treated as a malformed header.
export const MAX_FRAME_PAYLOAD = 16 * 1024 * 1024;

export const DEFAULT_CHUNK_SIZE = 4096;
export const MAX_FILENAME_LENGTH = 255;
export const PLACEHOLDER_FILENAME = 'unnamed_file';

export const DEFAULT_HOST = 'localhost';
export const DEFAULT_PORT = 8888;
export const DEFAULT_RECEIVE_DIR = 'received_files';
export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const DEFAULT_LINGER_MS = 2000;

export const MessageTag = {
  FILE_INFO: 'INFO',
  FILE_DATA: 'DATA',
  FILE_END: 'FEND',
  ACK: 'ACK_',
  ERROR: 'ERR_',
} as const;

export type MessageTagValue = (typeof MessageTag)[keyof typeof MessageTag];

export const ReceiverStatus = {
  READY: 'Ready to receive file',
  EXPECTED_INFO: 'Expected file info message',
  INCOMPLETE: 'File transfer incomplete',
} as const;
