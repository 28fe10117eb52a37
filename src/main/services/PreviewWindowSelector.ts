import { DecodedAudio, PreviewWindow } from '../../shared/models';

/** Default excerpt length in seconds. */
export const DEFAULT_PREVIEW_DURATION = 30;

/** Wall-clock length of one energy analysis chunk. */
export const ENERGY_CHUNK_SECONDS = 2;

/**
 * Computes the root-mean-square amplitude of consecutive fixed-length chunks.
 * The last chunk may be shorter than the rest.
 */
export function computeChunkEnergies(samples: ArrayLike<number>, chunkLength: number): number[] {
  const size = Math.max(1, Math.floor(chunkLength));
  const energies: number[] = [];
  for (let start = 0; start < samples.length; start += size) {
    const end = Math.min(samples.length, start + size);
    let sumSquares = 0;
    for (let cursor = start; cursor < end; cursor += 1) {
      const value = samples[cursor] ?? 0;
      sumSquares += value * value;
    }
    energies.push(Math.sqrt(sumSquares / (end - start)));
  }
  return energies;
}

/**
 * Index of the first maximum, or -1 for an empty list.
 */
function indexOfFirstMaximum(values: number[]): number {
  let bestIndex = -1;
  let bestValue = Number.NEGATIVE_INFINITY;
  for (let index = 0; index < values.length; index += 1) {
    const value = values[index] ?? 0;
    if (value > bestValue) {
      bestValue = value;
      bestIndex = index;
    }
  }
  return bestIndex;
}

/**
 * Picks the start offset (seconds) of the most energetic window of the track.
 *
 * Tracks no longer than the preview start at 0. Otherwise the loudest 2-second chunk
 * by RMS wins, earliest first on ties, and the start is pulled back so the preview
 * ends at or before the end of the track.
 */
export function selectPreviewStart(audio: DecodedAudio, previewDuration = DEFAULT_PREVIEW_DURATION): number {
  const totalDuration = audio.samples.length / audio.sampleRate;
  if (totalDuration <= previewDuration) {
    return 0;
  }

  const chunkLength = audio.sampleRate * ENERGY_CHUNK_SECONDS;
  const loudest = indexOfFirstMaximum(computeChunkEnergies(audio.samples, chunkLength));
  if (loudest < 0) {
    return 0;
  }

  let startTime = (loudest * chunkLength) / audio.sampleRate;
  if (startTime + previewDuration > totalDuration) {
    startTime = Math.max(0, totalDuration - previewDuration);
  }
  return startTime;
}

/**
 * Bounds a requested excerpt to the source: short sources play from 0 for their full length.
 */
export function resolvePreviewWindow(startOffset: number, previewDuration: number, sourceDuration: number): PreviewWindow {
  if (sourceDuration <= previewDuration) {
    return { startOffset: 0, duration: sourceDuration };
  }
  const clampedStart = Math.min(Math.max(0, startOffset), sourceDuration - previewDuration);
  return { startOffset: clampedStart, duration: previewDuration };
}
