import fs from 'node:fs/promises';
import path from 'node:path';
import { describeError } from '../errors';
import { assertSourceExists } from '../utils/audioFiles';

export const PREVIEW_CODEC = 'libmp3lame';
export const PREVIEW_BITRATE = '192k';

/**
 * One trim-and-encode request handed to a transcoder.
 */
export interface TranscodeSegmentRequest {
  sourcePath: string;
  destinationPath: string;
  /** Seconds into the source. */
  startOffset: number;
  /** Seconds of audio to keep. */
  duration: number;
  /** Encoder name, e.g. libmp3lame. */
  codec: string;
  /** Target bitrate, e.g. 192k. */
  bitrate: string;
}

/**
 * Narrow seam over the external transcoding tool. Implementations overwrite the destination.
 */
export interface Transcoder {
  transcodeSegment(request: TranscodeSegmentRequest): Promise<void>;
}

/**
 * Sibling path the transcoder writes to before the result replaces the destination.
 * The extension is kept so the encoder still picks its output format from it.
 */
export function resolvePartialPath(destinationPath: string): string {
  const { dir, name, ext } = path.parse(destinationPath);
  return path.join(dir, `${name}.partial${ext}`);
}

/**
 * Produces the compressed preview excerpt through an injected transcoder.
 */
export class PreviewExtractor {
  public constructor(private readonly transcoder: Transcoder) {}

  /**
   * Trims `duration` seconds from `startOffset` into an MP3 at `destinationPath`.
   * Rejects with NotFoundError before touching the destination when the source is missing.
   * The destination only changes when encoding succeeds; a failed run leaves any earlier file in place.
   */
  public async extractPreview(
    sourcePath: string,
    destinationPath: string,
    startOffset: number,
    duration: number
  ): Promise<string> {
    await assertSourceExists(sourcePath);
    if (!(duration > 0)) {
      throw new RangeError(`Preview duration must be positive, received ${duration}`);
    }
    await fs.mkdir(path.dirname(destinationPath), { recursive: true });
    const partialPath = resolvePartialPath(destinationPath);
    try {
      await this.transcoder.transcodeSegment({
        sourcePath,
        destinationPath: partialPath,
        startOffset: Math.max(0, startOffset),
        duration,
        codec: PREVIEW_CODEC,
        bitrate: PREVIEW_BITRATE
      });
      await fs.rename(partialPath, destinationPath);
    } catch (error) {
      await fs.rm(partialPath, { force: true }).catch((cleanupError: unknown) => {
        console.warn(`Failed to remove partial preview ${partialPath}:`, describeError(cleanupError));
      });
      throw error;
    }
    return destinationPath;
  }
}
