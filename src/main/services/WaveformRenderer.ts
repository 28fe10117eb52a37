import { DecodedAudio, RenderedImage, RgbColor, WaveformRenderOptions } from '../../shared/models';

export const DEFAULT_WAVEFORM_WIDTH = 800;
export const DEFAULT_WAVEFORM_HEIGHT = 400;
export const DEFAULT_BACKGROUND_COLOR: RgbColor = [26, 26, 46];
export const DEFAULT_WAVE_COLOR: RgbColor = [99, 102, 241];

/** Share of the half-height a full-scale bar may occupy. */
const BAR_HEIGHT_RATIO = 0.9;

/**
 * Computes the per-column peak envelope, normalised so the loudest column is exactly 1.
 * Always returns `width` entries; columns past the end of short input stay 0.
 */
export function computeWaveformEnvelope(samples: ArrayLike<number>, width: number): number[] {
  const columns = Math.max(0, Math.floor(width));
  const samplesPerPixel = Math.max(1, Math.floor(samples.length / Math.max(1, columns)));
  const envelope = new Array<number>(columns).fill(0);

  for (let column = 0; column < columns; column += 1) {
    const start = column * samplesPerPixel;
    if (start >= samples.length) {
      break;
    }
    const end = Math.min(samples.length, start + samplesPerPixel);
    let peak = 0;
    for (let cursor = start; cursor < end; cursor += 1) {
      const magnitude = Math.abs(samples[cursor] ?? 0);
      if (magnitude > peak) {
        peak = magnitude;
      }
    }
    envelope[column] = peak;
  }

  let globalPeak = 0;
  for (const value of envelope) {
    if (value > globalPeak) {
      globalPeak = value;
    }
  }
  // Silence keeps its all-zero envelope.
  if (globalPeak === 0) {
    return envelope;
  }
  return envelope.map((value) => value / globalPeak);
}

/**
 * Allocates a raster filled with a single colour.
 */
export function createRaster(width: number, height: number, color: RgbColor): RenderedImage {
  const data = new Uint8Array(width * height * 3);
  for (let offset = 0; offset < data.length; offset += 3) {
    data[offset] = color[0];
    data[offset + 1] = color[1];
    data[offset + 2] = color[2];
  }
  return { width, height, data };
}

/**
 * Reads the colour of one pixel.
 */
export function getPixel(image: RenderedImage, x: number, y: number): RgbColor {
  const offset = (y * image.width + x) * 3;
  return [image.data[offset] ?? 0, image.data[offset + 1] ?? 0, image.data[offset + 2] ?? 0];
}

/**
 * Paints a one pixel wide vertical line between two rows (inclusive), clipped to the raster.
 */
function drawVerticalLine(image: RenderedImage, x: number, fromY: number, toY: number, color: RgbColor): void {
  const top = Math.max(0, Math.min(fromY, toY));
  const bottom = Math.min(image.height - 1, Math.max(fromY, toY));
  for (let y = top; y <= bottom; y += 1) {
    const offset = (y * image.width + x) * 3;
    image.data[offset] = color[0];
    image.data[offset + 1] = color[1];
    image.data[offset + 2] = color[2];
  }
}

/**
 * Renders a vertically symmetric bar chart of the peak envelope.
 */
export function renderWaveform(audio: DecodedAudio, options: WaveformRenderOptions = {}): RenderedImage {
  const width = options.width ?? DEFAULT_WAVEFORM_WIDTH;
  const height = options.height ?? DEFAULT_WAVEFORM_HEIGHT;
  const waveColor = options.waveColor ?? DEFAULT_WAVE_COLOR;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new RangeError(`Waveform dimensions must be positive integers, received ${width}x${height}`);
  }

  const envelope = computeWaveformEnvelope(audio.samples, width);
  const image = createRaster(width, height, options.backgroundColor ?? DEFAULT_BACKGROUND_COLOR);
  const centerY = Math.floor(height / 2);

  envelope.forEach((amplitude, x) => {
    const barHeight = Math.round(amplitude * (height / 2) * BAR_HEIGHT_RATIO);
    drawVerticalLine(image, x, centerY - barHeight, centerY + barHeight, waveColor);
  });

  return image;
}
