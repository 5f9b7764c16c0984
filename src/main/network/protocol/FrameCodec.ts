import { TextDecoder } from 'util';
import {
  FRAME_HEADER_SIZE,
  FRAME_TAG_LENGTH,
  MAX_FRAME_PAYLOAD,
  MessageTag,
} from '../../../shared/constants/protocol';
import { Result } from '../../../shared/types/transfer';
import { sanitizeFileInfo } from '../../utils/validation';
import { errorMessage, ok, protocolViolation, transportFailure } from '../errors';
import { ByteStream } from '../transport/SocketStream';
import { Frame, ProtocolMessage, isMessageTag, tagFor } from './Protocol';

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

function buildFrame(tag: Buffer, payload: Buffer): Buffer {
  const header = Buffer.alloc(FRAME_HEADER_SIZE);
  tag.copy(header, 0);
  header.writeUInt32BE(payload.length, FRAME_TAG_LENGTH);
  return Buffer.concat([header, payload]);
}

/**
 * Frames an arbitrary tag and payload.
 * Format: [4-byte ASCII tag][uint32 BE payload length][payload]
 */
export function encodeFrame(tag: string | Buffer, payload: Buffer): Result<Buffer> {
  const tagBytes = typeof tag === 'string' ? Buffer.from(tag, 'ascii') : tag;
  if (tagBytes.length !== FRAME_TAG_LENGTH) {
    return protocolViolation('INVALID_TAG', `Message type must be exactly ${FRAME_TAG_LENGTH} bytes`);
  }
  if (payload.length > MAX_FRAME_PAYLOAD) {
    return protocolViolation('FRAME_TOO_LARGE', `Payload of ${payload.length} bytes exceeds frame limit`);
  }
  return ok(buildFrame(tagBytes, payload));
}

function payloadOf(message: ProtocolMessage): Buffer {
  switch (message.type) {
    case 'file-info':
      return Buffer.from(
        JSON.stringify({ filename: message.filename, filesize: message.filesize }),
        'utf8'
      );
    case 'file-data':
      return message.data;
    case 'file-end':
      return Buffer.alloc(0);
    case 'ack':
    case 'error':
      return Buffer.from(message.message, 'utf8');
  }
}

export function encodeMessage(message: ProtocolMessage): Buffer {
  return buildFrame(Buffer.from(tagFor(message), 'ascii'), payloadOf(message));
}

/**
 * Reads until `size` bytes are collected or the stream ends. A short result means
 * the peer went away; callers decide what that means.
 */
export async function readExact(stream: ByteStream, size: number): Promise<Buffer> {
  const parts: Buffer[] = [];
  let received = 0;

  while (received < size) {
    const chunk = await stream.read(size - received);
    if (chunk.length === 0) {
      break;
    }
    parts.push(chunk);
    received += chunk.length;
  }

  return parts.length === 1 ? parts[0] : Buffer.concat(parts, received);
}

export async function decodeFrame(stream: ByteStream): Promise<Result<Frame>> {
  try {
    const header = await readExact(stream, FRAME_HEADER_SIZE);
    if (header.length !== FRAME_HEADER_SIZE) {
      return transportFailure('Failed to receive complete header');
    }

    const tag = header.subarray(0, FRAME_TAG_LENGTH).toString('latin1');
    const length = header.readUInt32BE(FRAME_TAG_LENGTH);

    if (!isMessageTag(tag)) {
      return protocolViolation('UNKNOWN_TAG', `Unknown message type: ${JSON.stringify(tag)}`);
    }
    if (length > MAX_FRAME_PAYLOAD) {
      return protocolViolation('FRAME_TOO_LARGE', `Declared payload length ${length} exceeds frame limit`);
    }

    const payload = await readExact(stream, length);
    if (payload.length !== length) {
      return transportFailure('Failed to receive complete data');
    }

    return ok({ tag, payload });
  } catch (error) {
    return transportFailure(errorMessage(error), error);
  }
}

export function decodeMessage(frame: Frame): Result<ProtocolMessage> {
  switch (frame.tag) {
    case MessageTag.FILE_INFO:
      try {
        const info = sanitizeFileInfo(JSON.parse(strictUtf8.decode(frame.payload)));
        return ok({ type: 'file-info', filename: info.filename, filesize: info.filesize });
      } catch (error) {
        return protocolViolation(
          'INVALID_FILE_INFO',
          `Failed to parse file info: ${errorMessage(error)}`,
          error
        );
      }
    case MessageTag.FILE_DATA:
      return ok({ type: 'file-data', data: frame.payload });
    case MessageTag.FILE_END:
      return ok({ type: 'file-end' });
    case MessageTag.ACK:
      return ok({ type: 'ack', message: frame.payload.toString('utf8') });
    case MessageTag.ERROR:
      return ok({ type: 'error', message: frame.payload.toString('utf8') });
    default:
      return protocolViolation('UNKNOWN_TAG', `Unknown message type: ${JSON.stringify(frame.tag)}`);
  }
}

export async function readMessage(stream: ByteStream): Promise<Result<ProtocolMessage>> {
  const frame = await decodeFrame(stream);
  if (!frame.success) {
    return frame;
  }
  return decodeMessage(frame.value);
}

export async function writeMessage(stream: ByteStream, message: ProtocolMessage): Promise<Result<void>> {
  try {
    await stream.write(encodeMessage(message));
    return ok(undefined);
  } catch (error) {
    return transportFailure(errorMessage(error), error);
  }
}
