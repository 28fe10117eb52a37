import fs from 'node:fs/promises';
import path from 'node:path';
import { PNG } from 'pngjs';
import { RenderedImage } from '../../shared/models';

/**
 * Encodes an RGB raster as an opaque PNG.
 */
export function encodePng(image: RenderedImage): Buffer {
  const png = new PNG({ width: image.width, height: image.height });
  const pixelCount = image.width * image.height;
  for (let pixel = 0; pixel < pixelCount; pixel += 1) {
    const source = pixel * 3;
    const target = pixel * 4;
    png.data[target] = image.data[source] ?? 0;
    png.data[target + 1] = image.data[source + 1] ?? 0;
    png.data[target + 2] = image.data[source + 2] ?? 0;
    png.data[target + 3] = 255;
  }
  return PNG.sync.write(png, { colorType: 2 });
}

/**
 * Writes the raster to `outputPath`, creating parent folders and replacing any previous file.
 */
export async function writePng(image: RenderedImage, outputPath: string): Promise<string> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, encodePng(image));
  return outputPath;
}
