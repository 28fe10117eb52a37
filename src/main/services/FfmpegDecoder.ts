import { DecodedAudio } from '../../shared/models';
import { FFMPEG_REMEDIATION, ProcessingError } from '../errors';
import { assertSourceExists, toDecodedAudio } from '../utils/audioFiles';
import type { AudioDecoder, DecodeOptions } from './AudioDecoder';
import { runProcess } from './ProcessRunner';

/**
 * Builds the ffmpeg arguments that write mono 32-bit float PCM to stdout.
 */
export function buildDecodeArguments(filePath: string, options: DecodeOptions): string[] {
  const args = ['-v', 'error', '-i', filePath];
  if (options.maxDuration !== undefined && options.maxDuration !== null) {
    args.push('-t', String(options.maxDuration));
  }
  args.push('-vn', '-ac', '1', '-ar', String(options.sampleRate), '-f', 'f32le', 'pipe:1');
  return args;
}

/**
 * Converts little-endian float32 PCM bytes into clamped samples. A trailing partial frame is dropped.
 */
export function parseFloat32Samples(buffer: Buffer): Float32Array {
  const count = Math.floor(buffer.length / 4);
  const samples = new Float32Array(count);
  for (let index = 0; index < count; index += 1) {
    const value = buffer.readFloatLE(index * 4);
    samples[index] = Number.isFinite(value) ? Math.max(-1, Math.min(1, value)) : 0;
  }
  return samples;
}

/**
 * Decodes any container ffmpeg understands (MP3, AIFF, FLAC, ...) by piping raw PCM.
 */
export class FfmpegDecoder implements AudioDecoder {
  public constructor(private readonly ffmpegPath = 'ffmpeg') {}

  public async decode(filePath: string, options: DecodeOptions): Promise<DecodedAudio> {
    await assertSourceExists(filePath);
    const { stdout, stderr } = await runProcess(this.ffmpegPath, buildDecodeArguments(filePath, options), {
      remediation: FFMPEG_REMEDIATION
    });
    if (stdout.length === 0) {
      throw new ProcessingError(`Unable to decode ${filePath}`, stderr.trim() ? stderr : 'no audio samples were produced');
    }
    return toDecodedAudio(parseFloat32Samples(stdout), options.sampleRate, options.maxDuration);
  }
}
