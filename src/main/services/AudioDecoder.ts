import { DecodedAudio } from '../../shared/models';
import { isWaveFile } from '../utils/audioFiles';
import { FfmpegDecoder } from './FfmpegDecoder';
import { WaveFileDecoder } from './WaveFileDecoder';

/**
 * Sample rate used for both window analysis and waveform rendering.
 */
export const ANALYSIS_SAMPLE_RATE = 22050;

export interface DecodeOptions {
  /** Target sample rate in Hz. */
  sampleRate: number;
  /** Stop after this many seconds; omit to decode the whole file. */
  maxDuration?: number | null;
}

/**
 * Turns an audio file into mono float samples at a requested rate.
 * Implementations reject with NotFoundError for missing paths and ProcessingError for
 * unreadable or unsupported content instead of resolving with no samples.
 */
export interface AudioDecoder {
  decode(filePath: string, options: DecodeOptions): Promise<DecodedAudio>;
}

/**
 * Returns a decoder that reads WAV files in-process and hands every other format to ffmpeg.
 */
export function createDecoder(ffmpegPath = 'ffmpeg'): AudioDecoder {
  const waveDecoder = new WaveFileDecoder();
  const ffmpegDecoder = new FfmpegDecoder(ffmpegPath);
  return {
    decode: (filePath, options) =>
      isWaveFile(filePath) ? waveDecoder.decode(filePath, options) : ffmpegDecoder.decode(filePath, options)
  };
}
