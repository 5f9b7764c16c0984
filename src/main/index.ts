export { ConnectionAcceptor } from './network/ConnectionAcceptor';
export type { AcceptorState, ConnectionAcceptorOptions, SessionEndEvent } from './network/ConnectionAcceptor';
export { FileSender, interpretResponse } from './transfer/FileSender';
export type { Connector, FileSenderOptions } from './transfer/FileSender';
export { FileReceiver, receiveFile, formatProgress } from './transfer/FileReceiver';
export type { FileReceiverOptions } from './transfer/FileReceiver';
export {
  decodeFrame,
  decodeMessage,
  encodeFrame,
  encodeMessage,
  readExact,
  readMessage,
  writeMessage,
} from './network/protocol/FrameCodec';
export * from './network/protocol/Protocol';
export { SocketStream, connectTcp } from './network/transport/SocketStream';
export type { ByteStream, ConnectOptions } from './network/transport/SocketStream';
export { describeFailure } from './network/errors';
export { sanitizeFilename, resolveDestination } from './utils/pathSecurity';
export { defaultAppConfig, loadConfig, resolveConfigPath } from './config/configStore';
export * from '../shared/constants/protocol';
export type * from '../shared/types/transfer';
export type * from '../shared/types/config';
