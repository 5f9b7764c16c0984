import { MessageTag, MessageTagValue } from '../../../shared/constants/protocol';

export type ProtocolMessage = FileInfoMessage | FileDataMessage | FileEndMessage | AckMessage | ErrorMessage;

export interface FileInfoMessage {
  type: 'file-info';
  filename: string;
  filesize: number;
}

export interface FileDataMessage {
  type: 'file-data';
  data: Buffer;
}

export interface FileEndMessage {
  type: 'file-end';
}

export interface AckMessage {
  type: 'ack';
  message: string;
}

export interface ErrorMessage {
  type: 'error';
  message: string;
}

export interface Frame {
  tag: string;
  payload: Buffer;
}

export function tagFor(message: ProtocolMessage): MessageTagValue {
  switch (message.type) {
    case 'file-info':
      return MessageTag.FILE_INFO;
    case 'file-data':
      return MessageTag.FILE_DATA;
    case 'file-end':
      return MessageTag.FILE_END;
    case 'ack':
      return MessageTag.ACK;
    case 'error':
      return MessageTag.ERROR;
  }
}

export function isMessageTag(tag: string): tag is MessageTagValue {
  return Object.values<string>(MessageTag).includes(tag);
}

export const fileInfo = (filename: string, filesize: number): FileInfoMessage => ({
  type: 'file-info',
  filename,
  filesize,
});

export const fileData = (data: Buffer): FileDataMessage => ({ type: 'file-data', data });

export const fileEnd = (): FileEndMessage => ({ type: 'file-end' });

export const ack = (message = 'OK'): AckMessage => ({ type: 'ack', message });

export const errorReply = (message: string): ErrorMessage => ({ type: 'error', message });
