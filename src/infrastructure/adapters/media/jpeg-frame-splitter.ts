import { Transform, TransformCallback } from 'stream';

const SOI = Buffer.from([0xff, 0xd8]);
const EOI = Buffer.from([0xff, 0xd9]);

/**
 * Splits a concatenated MJPEG byte stream (ffmpeg `image2pipe`) into one
 * Buffer per JPEG image, delimited by the SOI and EOI markers.
 *
 * Bytes before the first SOI are dropped. A trailing partial image is
 * discarded at end of stream.
 */
export class JpegFrameSplitter extends Transform {
  private pending: Buffer = Buffer.alloc(0);

  constructor() {
    super({ readableObjectMode: true });
  }

  _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);

    for (;;) {
      const start = this.pending.indexOf(SOI);
      if (start === -1) {
        // Keep a trailing 0xFF, it may be the first half of the next marker
        this.pending =
          this.pending[this.pending.length - 1] === 0xff
            ? this.pending.subarray(this.pending.length - 1)
            : Buffer.alloc(0);
        break;
      }

      const end = this.pending.indexOf(EOI, start + SOI.length);
      if (end === -1) {
        this.pending = this.pending.subarray(start);
        break;
      }

      const frameEnd = end + EOI.length;
      this.push(Buffer.from(this.pending.subarray(start, frameEnd)));
      this.pending = this.pending.subarray(frameEnd);
    }

    callback();
  }

  _flush(callback: TransformCallback): void {
    this.pending = Buffer.alloc(0);
    callback();
  }
}
