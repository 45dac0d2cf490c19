import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import ffmpeg, { FfmpegCommand, FfprobeData } from 'fluent-ffmpeg';
import { AppConfig } from '../../../config/configuration';
import {
  FrameEncoding,
  FrameSource,
  FrameSourcePort,
} from '../../../application/ports/output/frame-source.port';
import { ExtractionError, errorMessage } from '../../../shared/errors';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';
import { JpegFrameSplitter } from './jpeg-frame-splitter';

const STDERR_TAIL_LENGTH = 500;

/**
 * FFmpeg Frame Source Adapter
 * Implements FrameSourcePort with fluent-ffmpeg.
 *
 * The source is probed first; a file ffprobe cannot read, or one without a
 * video stream, is rejected with ExtractionError before any decoding starts.
 * Frames are then decoded lazily through a single `image2pipe` MJPEG process
 * whose stdout is split into one JPEG per frame.
 */
@Injectable()
export class FfmpegFrameSourceAdapter implements FrameSourcePort {
  private readonly ffmpegPath?: string;
  private readonly ffprobePath?: string;

  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly logger: PinoLoggerService,
  ) {
    const extractionConfig = this.configService.get('extraction', { infer: true });
    this.ffmpegPath = extractionConfig.ffmpegPath;
    this.ffprobePath = extractionConfig.ffprobePath;

    this.logger.setContext(FfmpegFrameSourceAdapter.name);
  }

  async open(sourcePath: string, encoding: FrameEncoding): Promise<FrameSource> {
    const metadata = await this.probe(sourcePath);
    const videoStream = metadata.streams.find((stream) => stream.codec_type === 'video');

    if (!videoStream) {
      throw new ExtractionError(`Source has no video stream: ${sourcePath}`, {
        details: { sourcePath },
      });
    }

    this.logger.debug(
      {
        sourcePath,
        codec: videoStream.codec_name,
        width: videoStream.width,
        height: videoStream.height,
        frameRate: videoStream.r_frame_rate,
        durationSeconds: metadata.format.duration,
      },
      'Opened video source',
    );

    const command = this.createCommand(sourcePath)
      .noAudio()
      .format('image2pipe')
      .videoCodec('mjpeg')
      .outputOptions(['-q:v', encoding.quality.toString()]);

    return new FfmpegFrameSource(sourcePath, command, this.logger);
  }

  private probe(sourcePath: string): Promise<FfprobeData> {
    return new Promise((resolve, reject) => {
      this.createCommand(sourcePath).ffprobe((err: unknown, data: FfprobeData) => {
        if (err) {
          reject(
            new ExtractionError(`Cannot open video source: ${errorMessage(err)}`, {
              cause: err,
              details: { sourcePath },
            }),
          );
          return;
        }
        resolve(data);
      });
    });
  }

  private createCommand(sourcePath: string): FfmpegCommand {
    const command = ffmpeg(sourcePath);
    if (this.ffmpegPath) {
      command.setFfmpegPath(this.ffmpegPath);
    }
    if (this.ffprobePath) {
      command.setFfprobePath(this.ffprobePath);
    }
    return command;
  }
}

/**
 * One running decoder. Settles `finished` with the process error, or null on a
 * clean exit, so a short stdout is never mistaken for end of source.
 */
class FfmpegFrameSource implements FrameSource {
  private readonly splitter = new JpegFrameSplitter();
  private readonly frames: AsyncIterator<unknown>;
  private readonly finished: Promise<Error | null>;
  private running = true;
  private closed = false;
  private streamError: Error | null = null;

  constructor(
    private readonly sourcePath: string,
    private readonly command: FfmpegCommand,
    private readonly logger: PinoLoggerService,
  ) {
    this.finished = new Promise((resolve) => {
      command
        .on('end', () => {
          this.running = false;
          resolve(null);
        })
        .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
          this.running = false;
          if (this.closed) {
            resolve(null);
            return;
          }
          const tail = stderr ? stderr.slice(-STDERR_TAIL_LENGTH) : undefined;
          this.logger.error({ sourcePath, error: err, stderr: tail }, 'ffmpeg failed');
          resolve(err);
          // ffmpeg may fail before stdout was ever piped; end the splitter so a pending read drains
          if (!this.splitter.writableEnded) {
            this.splitter.end();
          }
        });
    });

    this.splitter.on('error', (err: Error) => {
      if (!this.closed) {
        this.streamError = err;
      }
    });

    this.frames = this.splitter[Symbol.asyncIterator]();
    command.pipe(this.splitter, { end: true });
  }

  async readFrame(): Promise<Buffer | null> {
    if (this.closed) {
      return null;
    }

    let next: IteratorResult<unknown>;
    try {
      next = await this.frames.next();
    } catch (error) {
      throw this.decodeError(error);
    }

    if (next.done) {
      const failure = (await this.finished) ?? this.streamError;
      if (failure) {
        throw this.decodeError(failure);
      }
      return null;
    }

    if (!Buffer.isBuffer(next.value)) {
      throw this.decodeError(new Error('Decoder produced a non-binary chunk'));
    }

    return next.value;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.running) {
      this.command.kill('SIGKILL');
    }
    this.splitter.destroy();
    await this.finished;
  }

  private decodeError(cause: unknown): ExtractionError {
    return new ExtractionError(`Failed to decode video source: ${errorMessage(cause)}`, {
      cause,
      details: { sourcePath: this.sourcePath },
    });
  }
}
