import { FFMPEG_REMEDIATION } from '../errors';
import type { Transcoder, TranscodeSegmentRequest } from './PreviewExtractor';
import { runProcess } from './ProcessRunner';

export interface FfmpegTranscoderOptions {
  /** Executable name or absolute path. */
  ffmpegPath?: string;
  /** Kill ffmpeg after this many milliseconds. */
  timeoutMs?: number | null;
}

/**
 * Builds the ffmpeg command line for a trimmed, re-encoded excerpt.
 * -ss: start offset, -t: duration, -y: overwrite output
 */
export function buildTranscodeArguments(request: TranscodeSegmentRequest): string[] {
  return [
    '-i', request.sourcePath,
    '-ss', String(request.startOffset),
    '-t', String(request.duration),
    '-vn',
    '-acodec', request.codec,
    '-ab', request.bitrate,
    '-y',
    request.destinationPath
  ];
}

/**
 * Transcoder backed by the ffmpeg command line tool.
 */
export class FfmpegTranscoder implements Transcoder {
  private readonly ffmpegPath: string;
  private readonly timeoutMs: number | null;

  public constructor(options: FfmpegTranscoderOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.timeoutMs = options.timeoutMs ?? null;
  }

  public async transcodeSegment(request: TranscodeSegmentRequest): Promise<void> {
    await runProcess(this.ffmpegPath, buildTranscodeArguments(request), {
      timeoutMs: this.timeoutMs,
      remediation: FFMPEG_REMEDIATION
    });
  }
}
