/**
 * Length-prefixed framing for the telemetry stream: a 2-byte little-endian
 * payload length followed by exactly that many bytes of UTF-8 text.
 */

export const LENGTH_PREFIX_BYTES = 2;
export const MAX_FRAME_PAYLOAD = 0xffff;

export function encodeFrame(payload: string): Buffer {
  const body = Buffer.from(payload, 'utf8');
  if (body.length > MAX_FRAME_PAYLOAD) {
    throw new RangeError(`Frame payload of ${body.length} bytes exceeds ${MAX_FRAME_PAYLOAD}`);
  }
  const frame = Buffer.alloc(LENGTH_PREFIX_BYTES + body.length);
  frame.writeUInt16LE(body.length, 0);
  body.copy(frame, LENGTH_PREFIX_BYTES);
  return frame;
}

/**
 * Accumulates stream chunks and yields complete frame payloads.
 * Bytes of an incomplete frame are kept until the rest arrives.
 */
export class FrameReader {
  private pending: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): Buffer[] {
    this.pending = this.pending.length ? Buffer.concat([this.pending, chunk]) : chunk;

    const frames: Buffer[] = [];
    let offset = 0;
    while (this.pending.length - offset >= LENGTH_PREFIX_BYTES) {
      const length = this.pending.readUInt16LE(offset);
      const end = offset + LENGTH_PREFIX_BYTES + length;
      if (end > this.pending.length) {
        break;
      }
      frames.push(Buffer.from(this.pending.subarray(offset + LENGTH_PREFIX_BYTES, end)));
      offset = end;
    }

    this.pending = Buffer.from(this.pending.subarray(offset));
    return frames;
  }

  /**
   * Number of buffered bytes that do not yet form a complete frame
   */
  get bufferedBytes(): number {
    return this.pending.length;
  }
}
