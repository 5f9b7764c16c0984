import { MAX_FRAME_PAYLOAD, MessageTag } from '../../src/shared/constants/protocol';
import {
  decodeFrame,
  decodeMessage,
  encodeFrame,
  encodeMessage,
  readExact,
  readMessage,
} from '../../src/main/network/protocol/FrameCodec';
import { ack, errorReply, fileData, fileEnd, fileInfo } from '../../src/main/network/protocol/Protocol';
import { header, streamOf } from '../helpers/streams';

function unwrap<T>(result: { success: true; value: T } | { success: false }): T {
  if (!result.success) {
    throw new Error('Expected a successful result');
  }
  return result.value;
}

describe('FrameCodec', () => {
  describe('encodeFrame', () => {
    it('writes the tag and a big-endian length before the payload', () => {
      const frame = unwrap(encodeFrame('INFO', Buffer.from('hello')));

      expect(frame.length).toBe(13);
      expect(frame.subarray(0, 4).toString('ascii')).toBe('INFO');
      expect([...frame.subarray(4, 8)]).toEqual([0, 0, 0, 5]);
      expect(frame.subarray(8).toString()).toBe('hello');
    });

    it('encodes lengths above 255 across the header bytes', () => {
      const frame = unwrap(encodeFrame('DATA', Buffer.alloc(0x0102)));

      expect([...frame.subarray(4, 8)]).toEqual([0, 0, 1, 2]);
    });

    it('accepts a tag given as bytes', () => {
      const frame = unwrap(encodeFrame(Buffer.from('FEND'), Buffer.alloc(0)));

      expect(frame).toEqual(Buffer.from([0x46, 0x45, 0x4e, 0x44, 0, 0, 0, 0]));
    });

    it.each(['ACK', 'DATAX', ''])('rejects the tag %p', (tag) => {
      const result = encodeFrame(tag, Buffer.alloc(1));

      expect(result).toEqual({
        success: false,
        failure: { kind: 'protocol', code: 'INVALID_TAG', message: 'Message type must be exactly 4 bytes' },
      });
    });
  });

  describe('encodeMessage', () => {
    it('serializes file info as JSON', () => {
      const frame = encodeMessage(fileInfo('a.txt', 3));
      const body = '{"filename":"a.txt","filesize":3}';

      expect(frame.subarray(0, 4).toString()).toBe('INFO');
      expect(frame.readUInt32BE(4)).toBe(body.length);
      expect(frame.subarray(8).toString()).toBe(body);
    });

    it('sends an empty payload for the end marker', () => {
      expect(encodeMessage(fileEnd())).toEqual(Buffer.from('FEND\0\0\0\0', 'latin1'));
    });

    it('defaults acknowledgements to OK', () => {
      expect(encodeMessage(ack()).subarray(8).toString()).toBe('OK');
    });
  });

  describe('readExact', () => {
    it('joins chunks until the requested size is reached', async () => {
      const stream = streamOf(Buffer.from('abc'), Buffer.from('def'), Buffer.from('ghi'));

      const first = await readExact(stream, 5);
      const second = await readExact(stream, 4);

      expect(first.toString()).toBe('abcde');
      expect(second.toString()).toBe('fghi');
    });

    it('returns what is left when the stream ends early', async () => {
      const stream = streamOf(Buffer.from('xyz'));

      const data = await readExact(stream, 10);

      expect(data.toString()).toBe('xyz');
      expect((await readExact(stream, 4)).length).toBe(0);
    });
  });

  describe('decodeFrame', () => {
    it('returns every tag and payload in the order they were written', async () => {
      const sizes = [0, 1, 4096];
      const expected = Object.values(MessageTag).flatMap((tag) =>
        sizes.map((size) => ({ tag, payload: Buffer.alloc(size, size % 251) }))
      );
      const stream = streamOf(...expected.map(({ tag, payload }) => unwrap(encodeFrame(tag, payload))));

      for (const frame of expected) {
        expect(unwrap(await decodeFrame(stream))).toEqual(frame);
      }
    });

    it('reports a truncated header as a transport failure', async () => {
      const result = await decodeFrame(streamOf(Buffer.from('INF')));

      expect(result).toEqual({
        success: false,
        failure: { kind: 'transport', message: 'Failed to receive complete header' },
      });
    });

    it('reports a truncated payload as a transport failure', async () => {
      const result = await decodeFrame(streamOf(header('DATA', 10), Buffer.from('abcd')));

      expect(result).toEqual({
        success: false,
        failure: { kind: 'transport', message: 'Failed to receive complete data' },
      });
    });

    it('rejects an unknown tag', async () => {
      const result = await decodeFrame(streamOf(header('XXXX', 0)));

      expect(result).toEqual({
        success: false,
        failure: { kind: 'protocol', code: 'UNKNOWN_TAG', message: 'Unknown message type: "XXXX"' },
      });
    });

    it('rejects a declared length above the frame limit without reading it', async () => {
      const result = await decodeFrame(streamOf(header('DATA', MAX_FRAME_PAYLOAD + 1)));

      expect(result).toEqual({
        success: false,
        failure: {
          kind: 'protocol',
          code: 'FRAME_TOO_LARGE',
          message: `Declared payload length ${MAX_FRAME_PAYLOAD + 1} exceeds frame limit`,
        },
      });
    });
  });

  describe('decodeMessage', () => {
    it('parses file info', () => {
      const payload = Buffer.from(JSON.stringify({ filename: 'report.pdf', filesize: 1024 }));

      expect(unwrap(decodeMessage({ tag: 'INFO', payload }))).toEqual({
        type: 'file-info',
        filename: 'report.pdf',
        filesize: 1024,
      });
    });

    it('keeps the declared filename unsanitized', () => {
      const payload = Buffer.from(JSON.stringify({ filename: '../up.txt', filesize: 0 }));

      expect(unwrap(decodeMessage({ tag: 'INFO', payload }))).toEqual({
        type: 'file-info',
        filename: '../up.txt',
        filesize: 0,
      });
    });

    it.each([
      ['{not json', 'Failed to parse file info: '],
      ['[]', 'Failed to parse file info: File info must be a JSON object.'],
      ['{"filename":"a","filesize":-1}', 'Failed to parse file info: Field "filesize" must be >= 0.'],
      ['{"filename":"a","filesize":1.5}', 'Failed to parse file info: Field "filesize" must be an integer.'],
      ['{"filesize":1}', 'Failed to parse file info: Field "filename" must be a string.'],
    ])('rejects the file info body %s', (body, prefix) => {
      const result = decodeMessage({ tag: 'INFO', payload: Buffer.from(body) });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.failure.kind).toBe('protocol');
        expect(result.failure.code).toBe('INVALID_FILE_INFO');
        expect(result.failure.message.startsWith(prefix)).toBe(true);
      }
    });

    it('rejects file info that is not UTF-8', () => {
      const result = decodeMessage({ tag: 'INFO', payload: Buffer.from([0xff, 0xfe, 0x7b]) });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.failure.kind).toBe('protocol');
      }
    });

    it('decodes acknowledgement and error text', () => {
      expect(unwrap(decodeMessage({ tag: 'ACK_', payload: Buffer.from('Ready') }))).toEqual(ack('Ready'));
      expect(unwrap(decodeMessage({ tag: 'ERR_', payload: Buffer.from('Disk full') }))).toEqual(
        errorReply('Disk full')
      );
    });
  });

  it('reads back messages written with encodeMessage', async () => {
    const data = Buffer.from([0, 1, 2, 250, 255]);
    const stream = streamOf(
      encodeMessage(fileInfo('notes.txt', 5)),
      encodeMessage(fileData(data)),
      encodeMessage(fileEnd())
    );

    expect(unwrap(await readMessage(stream))).toEqual(fileInfo('notes.txt', 5));
    expect(unwrap(await readMessage(stream))).toEqual(fileData(data));
    expect(unwrap(await readMessage(stream))).toEqual(fileEnd());
    expect((await readMessage(stream)).success).toBe(false);
  });
});
