/**
 * Encoding applied to every frame handed out by a frame source.
 */
export interface FrameEncoding {
  format: 'jpg';
  /** ffmpeg `-q:v` scale, 2 (best) to 31 (smallest). */
  quality: number;
}

/**
 * An open, sequentially readable media source.
 */
export interface FrameSource {
  /**
   * Decode and encode the next frame. Resolves null once the source is exhausted.
   */
  readFrame(): Promise<Buffer | null>;

  /**
   * Release the underlying decoder. Safe to call more than once.
   */
  close(): Promise<void>;
}

/**
 * Frame Source Port (Driven Port)
 */
export interface FrameSourcePort {
  /**
   * Open `sourcePath` for sequential frame reading.
   * Raises ExtractionError when the source cannot be opened.
   */
  open(sourcePath: string, encoding: FrameEncoding): Promise<FrameSource>;
}
