import * as fs from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import { ReceiverStatus } from '../../shared/constants/protocol';
import {
  ReceiveSummary,
  ReceiverState,
  Result,
  StatusReporter,
  TransferFailure,
  TransferSession,
} from '../../shared/types/transfer';
import { readMessage, writeMessage } from '../network/protocol/FrameCodec';
import { ack, errorReply, tagFor } from '../network/protocol/Protocol';
import { ByteStream } from '../network/transport/SocketStream';
import { errorMessage, fileSystemFailure, ok } from '../network/errors';
import { logger, reportStatus } from '../utils/logger';
import { resolveDestination, sanitizeFilename } from '../utils/pathSecurity';

export interface FileReceiverOptions {
  destinationDir: string;
  reporter?: StatusReporter;
}

interface ReceiveLoopOutcome {
  endedExplicitly: boolean;
  failure?: TransferFailure;
}

export function formatProgress(received: number, total: number): string {
  const percentage = total > 0 ? (received / total) * 100 : 100;
  return `Received ${received}/${total} bytes (${percentage.toFixed(1)}%)`;
}

/**
 * Handles exactly one inbound connection:
 * AWAIT_INFO -> READY -> RECEIVING -> COMPLETE | FAILED.
 * The stream is always closed when `run` settles.
 */
export class FileReceiver {
  private readonly session: TransferSession;
  private fileName = '';

  constructor(
    private readonly stream: ByteStream,
    private readonly options: FileReceiverOptions
  ) {
    this.session = {
      sessionId: uuidv4(),
      remoteAddress: stream.remoteAddress,
      declaredSize: 0,
      bytesTransferred: 0,
      state: 'AWAIT_INFO',
    };
  }

  get state(): ReceiverState {
    return this.session.state;
  }

  get sessionInfo(): Readonly<TransferSession> {
    return this.session;
  }

  async run(): Promise<Result<ReceiveSummary>> {
    this.report(`Handling client ${this.session.remoteAddress}`);

    try {
      return await this.receive();
    } catch (error) {
      // Local I/O (write, close) is the only thing that throws in here.
      this.report(`Error handling client ${this.session.remoteAddress}: ${errorMessage(error)}`);
      await this.sendError(`Server error: ${errorMessage(error)}`);
      await this.discardPartialFile();
      this.session.state = 'FAILED';
      return fileSystemFailure(errorMessage(error), error);
    } finally {
      await this.stream.close();
      this.report(`Connection with ${this.session.remoteAddress} closed`);
    }
  }

  private async receive(): Promise<Result<ReceiveSummary>> {
    const first = await readMessage(this.stream);
    if (!first.success) {
      // A frame of an unknown kind is still "not file info" to the peer.
      if (first.failure.code === 'UNKNOWN_TAG') {
        await this.sendError(ReceiverStatus.EXPECTED_INFO);
      } else if (first.failure.kind === 'protocol') {
        await this.sendError(first.failure.message);
      }
      return this.failWith(first.failure);
    }
    if (first.value.type !== 'file-info') {
      await this.sendError(ReceiverStatus.EXPECTED_INFO);
      return this.failWith({
        kind: 'protocol',
        code: 'UNEXPECTED_MESSAGE',
        message: `${ReceiverStatus.EXPECTED_INFO}, got ${tagFor(first.value)}`,
      });
    }

    this.fileName = sanitizeFilename(first.value.filename);
    this.session.declaredSize = first.value.filesize;
    this.report(`Receiving file: ${this.fileName} (${this.session.declaredSize} bytes)`);

    const destinationPath = await resolveDestination(this.options.destinationDir, this.fileName);
    const handle = await fs.open(destinationPath, 'w');
    this.session.destinationPath = destinationPath;
    this.session.state = 'READY';

    let outcome: ReceiveLoopOutcome;
    try {
      const ready = await writeMessage(this.stream, ack(ReceiverStatus.READY));
      if (ready.success) {
        this.session.state = 'RECEIVING';
        outcome = await this.receiveChunks(handle);
      } else {
        outcome = { endedExplicitly: false, failure: ready.failure };
      }
    } finally {
      await handle.close();
    }

    return this.finish(outcome, destinationPath);
  }

  private async receiveChunks(handle: fs.FileHandle): Promise<ReceiveLoopOutcome> {
    const { declaredSize } = this.session;

    while (this.session.bytesTransferred < declaredSize) {
      const next = await readMessage(this.stream);
      if (!next.success) {
        if (next.failure.kind === 'protocol') {
          this.report(`Protocol error: ${next.failure.message}`);
          await this.sendError(next.failure.message);
        }
        return { endedExplicitly: false, failure: next.failure };
      }

      const message = next.value;
      switch (message.type) {
        case 'file-data': {
          await handle.write(message.data, 0, message.data.length, this.session.bytesTransferred);
          this.session.bytesTransferred += message.data.length;

          const sent = await writeMessage(
            this.stream,
            ack(formatProgress(this.session.bytesTransferred, declaredSize))
          );
          if (!sent.success) {
            return { endedExplicitly: false, failure: sent.failure };
          }
          break;
        }
        case 'file-end':
          return { endedExplicitly: true };
        case 'file-info':
        case 'ack':
        case 'error': {
          const violation = `Unexpected message type: ${tagFor(message)}`;
          this.report(`Protocol error: ${violation}`);
          await this.sendError(violation);
          return {
            endedExplicitly: false,
            failure: { kind: 'protocol', code: 'UNEXPECTED_MESSAGE', message: violation },
          };
        }
      }
    }

    return { endedExplicitly: false };
  }

  private async finish(
    outcome: ReceiveLoopOutcome,
    destinationPath: string
  ): Promise<Result<ReceiveSummary>> {
    const { bytesTransferred, declaredSize } = this.session;
    const complete = !outcome.failure && bytesTransferred === declaredSize;
    // An explicit end marker is honoured even when fewer bytes than declared arrived.
    const endedEarly = !outcome.failure && outcome.endedExplicitly && bytesTransferred < declaredSize;

    if (complete || endedEarly) {
      this.session.state = 'COMPLETE';
      const text = complete
        ? `File '${this.fileName}' received successfully`
        : `File '${this.fileName}' received successfully (${bytesTransferred} of ${declaredSize} bytes, ended early)`;
      this.report(`File received successfully: ${destinationPath}`);

      const sent = await writeMessage(this.stream, ack(text));
      if (!sent.success) {
        logger.warn('Final acknowledgement could not be delivered', {
          sessionId: this.session.sessionId,
          error: sent.failure.message,
        });
      }

      return ok({
        sessionId: this.session.sessionId,
        fileName: this.fileName,
        destinationPath,
        bytesReceived: bytesTransferred,
        declaredSize,
        truncated: endedEarly,
      });
    }

    this.report(`File transfer incomplete: ${bytesTransferred}/${declaredSize} bytes`);
    await this.discardPartialFile();
    await this.sendError(ReceiverStatus.INCOMPLETE);

    return this.failWith(
      outcome.failure ?? {
        kind: 'application',
        message: `${ReceiverStatus.INCOMPLETE}: ${bytesTransferred}/${declaredSize} bytes`,
      }
    );
  }

  private failWith(failure: TransferFailure): Result<ReceiveSummary> {
    this.session.state = 'FAILED';
    logger.warn('Receive session failed', {
      sessionId: this.session.sessionId,
      remote: this.session.remoteAddress,
      kind: failure.kind,
      error: failure.message,
    });

    return { success: false, failure };
  }

  private async discardPartialFile(): Promise<void> {
    const target = this.session.destinationPath;
    if (!target) {
      return;
    }
    try {
      await fs.rm(target, { force: true });
    } catch (error) {
      logger.error('Failed to remove incomplete file', { path: target, error: errorMessage(error) });
    }
  }

  private async sendError(text: string): Promise<void> {
    const sent = await writeMessage(this.stream, errorReply(text));
    if (!sent.success) {
      logger.debug('Error frame could not be delivered', {
        sessionId: this.session.sessionId,
        error: sent.failure.message,
      });
    }
  }

  private report(message: string): void {
    reportStatus(this.options.reporter, message, { sessionId: this.session.sessionId });
  }
}

export function receiveFile(
  stream: ByteStream,
  options: FileReceiverOptions
): Promise<Result<ReceiveSummary>> {
  return new FileReceiver(stream, options).run();
}
