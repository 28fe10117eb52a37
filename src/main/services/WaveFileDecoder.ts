import fs from 'node:fs/promises';
import { WaveFile } from 'wavefile';
import { DecodedAudio } from '../../shared/models';
import { ProcessingError, describeError } from '../errors';
import { assertSourceExists, toDecodedAudio } from '../utils/audioFiles';
import type { AudioDecoder, DecodeOptions } from './AudioDecoder';

interface WaveFormatChunk {
  numChannels?: number;
  sampleRate?: number;
  bitsPerSample?: number;
}

/**
 * Decodes PCM and IEEE float WAV files in-process with wavefile.
 */
export class WaveFileDecoder implements AudioDecoder {
  /**
   * Reads the file, resamples it when needed and averages all channels to mono.
   */
  public async decode(filePath: string, options: DecodeOptions): Promise<DecodedAudio> {
    await assertSourceExists(filePath);

    let wave: WaveFile;
    let channels: Float64Array[];
    try {
      const buffer = await fs.readFile(filePath);
      wave = new WaveFile(buffer);
      const format = wave.fmt as WaveFormatChunk;
      if (!format.sampleRate || format.sampleRate <= 0) {
        throw new Error('missing sample rate information');
      }
      if (format.sampleRate !== options.sampleRate) {
        wave.toSampleRate(options.sampleRate);
      }
      const sampleBlock = wave.getSamples(false, Float64Array) as Float64Array | Float64Array[];
      channels = Array.isArray(sampleBlock) ? sampleBlock : [sampleBlock];
    } catch (error) {
      throw new ProcessingError(`Unable to decode ${filePath}`, describeError(error));
    }

    const { scale, offset } = this.resolveAmplitudeScale(wave);
    const frameCount = channels[0]?.length ?? 0;
    const maxFrames =
      options.maxDuration === undefined || options.maxDuration === null
        ? frameCount
        : Math.min(frameCount, Math.floor(options.maxDuration * options.sampleRate));
    const mono = new Float32Array(maxFrames);

    for (let frame = 0; frame < maxFrames; frame += 1) {
      let sum = 0;
      for (const channel of channels) {
        sum += ((channel[frame] ?? 0) - offset) / scale;
      }
      const mixed = sum / channels.length;
      mono[frame] = Math.max(-1, Math.min(1, mixed));
    }

    return toDecodedAudio(mono, options.sampleRate);
  }

  /**
   * Determines the divisor (and unsigned offset for 8-bit data) that maps raw samples to -1..1.
   */
  private resolveAmplitudeScale(wave: WaveFile): { scale: number; offset: number } {
    const bitDepthText = typeof wave.bitDepth === 'string' ? wave.bitDepth.trim() : '';
    if (bitDepthText.toLowerCase().includes('f')) {
      return { scale: 1, offset: 0 };
    }
    const parsedBitDepth = Number.parseInt(bitDepthText, 10);
    if (parsedBitDepth === 8) {
      return { scale: 128, offset: 128 };
    }
    if (Number.isFinite(parsedBitDepth) && parsedBitDepth > 0) {
      return { scale: 2 ** (parsedBitDepth - 1), offset: 0 };
    }
    const fmtDepth = (wave.fmt as WaveFormatChunk).bitsPerSample;
    if (typeof fmtDepth === 'number' && Number.isFinite(fmtDepth) && fmtDepth > 0) {
      return { scale: 2 ** (fmtDepth - 1), offset: 0 };
    }
    return { scale: 1, offset: 0 };
  }
}
