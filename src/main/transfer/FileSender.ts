import * as fs from 'fs/promises';
import * as path from 'path';
import PQueue from 'p-queue';
import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_CHUNK_SIZE } from '../../shared/constants/protocol';
import {
  BatchSendResult,
  FailedResult,
  Result,
  SendSummary,
  StatusReporter,
} from '../../shared/types/transfer';
import {
  applicationError,
  describeFailure,
  errorMessage,
  fileSystemFailure,
  ok,
  protocolViolation,
  transportFailure,
} from '../network/errors';
import { readMessage, writeMessage } from '../network/protocol/FrameCodec';
import { ProtocolMessage, fileData, fileEnd, fileInfo, tagFor } from '../network/protocol/Protocol';
import { ByteStream, ConnectOptions, connectTcp } from '../network/transport/SocketStream';
import { logger, reportStatus } from '../utils/logger';

export type Connector = (options: ConnectOptions) => Promise<ByteStream>;

export interface FileSenderOptions {
  host: string;
  port: number;
  chunkSize?: number;
  maxConcurrentTransfers?: number;
  reporter?: StatusReporter;
  connect?: Connector;
}

/**
 * Pushes local files to a receiver, one connection per file, waiting for an
 * acknowledgement after every frame before sending the next one.
 */
export class FileSender {
  private readonly chunkSize: number;
  private readonly maxConcurrentTransfers: number;
  private readonly connect: Connector;

  constructor(private readonly options: FileSenderOptions) {
    this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this.maxConcurrentTransfers = options.maxConcurrentTransfers ?? 1;
    this.connect = options.connect ?? connectTcp;
  }

  async sendFile(filePath: string): Promise<Result<SendSummary>> {
    const sessionId = uuidv4();

    let filesize: number;
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        return this.failed(sessionId, fileSystemFailure(`Path is not a file: ${filePath}`));
      }
      filesize = stats.size;
    } catch (error) {
      return this.failed(sessionId, fileSystemFailure(`File not found: ${filePath}`, error));
    }

    const fileName = path.basename(filePath);
    const { host, port } = this.options;
    this.report(`Connecting to ${host}:${port}...`);

    let stream: ByteStream;
    try {
      stream = await this.connect({ host, port });
    } catch (error) {
      return this.failed(sessionId, transportFailure(errorMessage(error), error));
    }

    try {
      this.report(`Connected! Sending file: ${fileName} (${filesize} bytes)`);
      const result = await this.transfer(stream, filePath, fileName, filesize);
      if (!result.success) {
        return this.failed(sessionId, result);
      }

      this.report(result.value.message);
      return ok({ sessionId, filePath, fileName, ...result.value });
    } catch (error) {
      return this.failed(sessionId, fileSystemFailure(errorMessage(error), error));
    } finally {
      await stream.close();
      this.report('Connection closed.');
    }
  }

  async sendMultipleFiles(filePaths: string[]): Promise<BatchSendResult[]> {
    const queue = new PQueue({ concurrency: this.maxConcurrentTransfers });
    const results = await Promise.all(
      filePaths.map((filePath) =>
        queue.add(async (): Promise<BatchSendResult> => {
          const result = await this.sendFile(filePath);
          if (result.success) {
            this.report(`Successfully sent: ${filePath}`);
          } else {
            this.report(`Failed to send ${filePath}: ${describeFailure(result.failure)}`);
          }
          return { filePath, result };
        })
      )
    );

    await queue.onIdle();
    return results;
  }

  private async transfer(
    stream: ByteStream,
    filePath: string,
    fileName: string,
    filesize: number
  ): Promise<Result<{ bytesSent: number; message: string }>> {
    const infoSent = await writeMessage(stream, fileInfo(fileName, filesize));
    if (!infoSent.success) {
      return infoSent;
    }

    const ready = await this.expectAck(stream);
    if (!ready.success) {
      return ready;
    }
    this.report(`Server ready: ${ready.value}`);

    let handle: fs.FileHandle;
    try {
      handle = await fs.open(filePath, 'r');
    } catch (error) {
      return fileSystemFailure(`Cannot read ${filePath}: ${errorMessage(error)}`, error);
    }

    let bytesSent = 0;
    try {
      const buffer = Buffer.alloc(this.chunkSize);
      for (;;) {
        const { bytesRead } = await handle.read(buffer, 0, this.chunkSize, null);
        if (bytesRead === 0) {
          break;
        }

        // Copy: the frame must not alias the buffer reused for the next read.
        const sent = await writeMessage(stream, fileData(Buffer.from(buffer.subarray(0, bytesRead))));
        if (!sent.success) {
          return sent;
        }
        bytesSent += bytesRead;

        const progress = await this.expectAck(stream);
        if (!progress.success) {
          return progress;
        }
        this.report(progress.value);
      }
    } catch (error) {
      return fileSystemFailure(`Cannot read ${filePath}: ${errorMessage(error)}`, error);
    } finally {
      await handle.close();
    }

    const endSent = await writeMessage(stream, fileEnd());
    if (!endSent.success) {
      return endSent;
    }

    const final = await this.expectAck(stream);
    if (!final.success) {
      return final;
    }
    return ok({ bytesSent, message: final.value });
  }

  private async expectAck(stream: ByteStream): Promise<Result<string>> {
    const response = await readMessage(stream);
    if (!response.success) {
      return response;
    }
    return interpretResponse(response.value);
  }

  private failed(sessionId: string, result: FailedResult): FailedResult {
    const { failure } = result;
    logger.error('File transfer failed', { sessionId, kind: failure.kind, error: failure.message });
    this.report(describeFailure(failure));
    return result;
  }

  private report(message: string): void {
    reportStatus(this.options.reporter, message);
  }
}

/** ACK carries on, ERROR surfaces the receiver's text, anything else is a protocol violation. */
export function interpretResponse(message: ProtocolMessage): Result<string> {
  switch (message.type) {
    case 'ack':
      return ok(message.message);
    case 'error':
      return applicationError(message.message);
    case 'file-info':
    case 'file-data':
    case 'file-end':
      return protocolViolation('UNEXPECTED_MESSAGE', `Expected ACK, got: ${tagFor(message)}`);
  }
}
