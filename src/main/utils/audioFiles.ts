import fs from 'node:fs/promises';
import path from 'node:path';
import { DecodedAudio } from '../../shared/models';
import { NotFoundError } from '../errors';

const WAVE_EXTENSIONS = new Set(['.wav', '.wave']);

/**
 * Returns true when the path carries a RIFF/WAVE extension.
 */
export function isWaveFile(filePath: string): boolean {
  return WAVE_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

/**
 * Resolves when the path exists and rejects with NotFoundError otherwise.
 */
export async function assertSourceExists(filePath: string): Promise<void> {
  try {
    await fs.access(filePath);
  } catch {
    throw new NotFoundError(filePath);
  }
}

/**
 * Wraps mono samples, truncating them to `maxDuration` seconds when a cap is given.
 */
export function toDecodedAudio(samples: Float32Array, sampleRate: number, maxDuration?: number | null): DecodedAudio {
  let limited = samples;
  if (maxDuration !== undefined && maxDuration !== null && maxDuration >= 0) {
    const maxFrames = Math.floor(maxDuration * sampleRate);
    if (samples.length > maxFrames) {
      limited = samples.subarray(0, maxFrames);
    }
  }
  return {
    samples: limited,
    sampleRate,
    duration: limited.length / sampleRate
  };
}

/**
 * Returns the first `seconds` of already decoded audio without copying the buffer.
 */
export function takeLeadingSeconds(audio: DecodedAudio, seconds: number): DecodedAudio {
  return toDecodedAudio(audio.samples, audio.sampleRate, seconds);
}
