import { RelayError } from './errors.js';

export const HEADER_LENGTH_BYTES = 2;
export const MAX_DEVICE_ID_BYTES = 0xffff;

export interface DecodedFrame {
  deviceId: string;
  payload: Buffer;
}

/**
 * Builds the per-device prefix of a multiplexed frame:
 * a big-endian uint16 byte length followed by the UTF-8 device id.
 */
export function encodeFrameHeader(deviceId: string): Buffer {
  const id = Buffer.from(deviceId, 'utf8');
  if (id.length === 0 || id.length > MAX_DEVICE_ID_BYTES) {
    throw new RelayError(
      'invalid_device_id',
      `device id must be 1..${MAX_DEVICE_ID_BYTES} bytes, got ${id.length}`,
    );
  }
  const header = Buffer.allocUnsafe(HEADER_LENGTH_BYTES + id.length);
  header.writeUInt16BE(id.length, 0);
  id.copy(header, HEADER_LENGTH_BYTES);
  return header;
}

export function encodeFrame(deviceId: string, payload: Uint8Array): Buffer {
  return Buffer.concat([encodeFrameHeader(deviceId), payload]);
}

/** Returns an encoder bound to one device so the header is built once per stream. */
export function createFrameEncoder(deviceId: string): (payload: Uint8Array) => Buffer {
  const header = encodeFrameHeader(deviceId);
  return (payload) => Buffer.concat([header, payload], header.length + payload.length);
}

export function decodeFrame(message: Uint8Array): DecodedFrame {
  const buf = Buffer.isBuffer(message)
    ? message
    : Buffer.from(message.buffer, message.byteOffset, message.byteLength);
  if (buf.length < HEADER_LENGTH_BYTES) {
    throw new RelayError('malformed_frame', 'frame shorter than its length prefix');
  }
  const idLength = buf.readUInt16BE(0);
  const payloadStart = HEADER_LENGTH_BYTES + idLength;
  if (buf.length < payloadStart) {
    throw new RelayError('malformed_frame', `frame truncated inside device id (${idLength} bytes declared)`);
  }
  return {
    deviceId: buf.toString('utf8', HEADER_LENGTH_BYTES, payloadStart),
    payload: buf.subarray(payloadStart),
  };
}
