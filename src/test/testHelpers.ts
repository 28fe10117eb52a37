/**
 * Test helpers for generating WAV fixtures, decoded buffers and isolated temp folders.
 */
import { WaveFile } from 'wavefile';
import fs from 'node:fs/promises';
import path from 'node:path';
import { DecodedAudio } from '../shared/models';
import type { Transcoder, TranscodeSegmentRequest } from '../main/services/PreviewExtractor';

export interface LoudSegment {
  /** Seconds. */
  start: number;
  /** Seconds, exclusive. */
  end: number;
  /** Peak amplitude in 0..1. */
  amplitude: number;
}

export interface TestWavOptions {
  duration?: number;
  sampleRate?: number;
  bitDepth?: '16' | '32f';
  channels?: number;
  /** Amplitude outside the loud segments. */
  baseAmplitude?: number;
  loudSegments?: LoudSegment[];
}

/**
 * Square wave amplitude (alternating sign every sample) for a time position.
 */
function amplitudeAt(time: number, baseAmplitude: number, loudSegments: LoudSegment[]): number {
  for (const segment of loudSegments) {
    if (time >= segment.start && time < segment.end) {
      return segment.amplitude;
    }
  }
  return baseAmplitude;
}

export class TestWavGenerator {
  /**
   * Creates an alternating-sign test signal so every sample carries the segment amplitude.
   */
  public static createTestWav(options: TestWavOptions = {}): Buffer {
    const {
      duration = 1,
      sampleRate = 22050,
      bitDepth = '16',
      channels = 1,
      baseAmplitude = 0.1,
      loudSegments = []
    } = options;

    const numSamples = Math.floor(sampleRate * duration);
    const scale = bitDepth === '32f' ? 1 : 32767;
    const channelData: number[][] = [];
    for (let channel = 0; channel < channels; channel += 1) {
      const samples = new Array<number>(numSamples);
      for (let i = 0; i < numSamples; i += 1) {
        const sign = i % 2 === 0 ? 1 : -1;
        const value = sign * amplitudeAt(i / sampleRate, baseAmplitude, loudSegments) * scale;
        samples[i] = bitDepth === '32f' ? value : Math.round(value);
      }
      channelData.push(samples);
    }

    const wav = new WaveFile();
    wav.fromScratch(channels, sampleRate, bitDepth, channels === 1 ? channelData[0] ?? [] : channelData);
    return Buffer.from(wav.toBuffer());
  }

  /**
   * Writes a test WAV file to disk.
   */
  public static async writeTestWav(filePath: string, options: TestWavOptions = {}): Promise<void> {
    const buffer = this.createTestWav(options);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, buffer);
  }

  /**
   * Cleans up a test directory.
   */
  public static async cleanupTestDirectory(rootPath: string): Promise<void> {
    try {
      await fs.rm(rootPath, { recursive: true, force: true });
    } catch (error) {
      console.warn(`Failed to cleanup test directory at ${rootPath}:`, error);
    }
  }
}

/**
 * Builds decoded audio directly: `levels[i]` fills block i, each `secondsPerLevel` long.
 */
export function decodedFromLevels(levels: number[], sampleRate: number, secondsPerLevel = 1): DecodedAudio {
  const perLevel = Math.round(sampleRate * secondsPerLevel);
  const samples = new Float32Array(levels.length * perLevel);
  levels.forEach((level, index) => {
    samples.fill(level, index * perLevel, (index + 1) * perLevel);
  });
  return { samples, sampleRate, duration: samples.length / sampleRate };
}

/**
 * In-process transcoder double: records requests and writes a deterministic payload.
 */
export class FakeTranscoder implements Transcoder {
  public readonly requests: TranscodeSegmentRequest[] = [];
  public failWith: Error | null = null;

  public async transcodeSegment(request: TranscodeSegmentRequest): Promise<void> {
    this.requests.push(request);
    if (this.failWith) {
      throw this.failWith;
    }
    await fs.writeFile(
      request.destinationPath,
      `${path.basename(request.sourcePath)}|${request.startOffset}|${request.duration}|${request.codec}|${request.bitrate}`
    );
  }
}

/**
 * Writes an executable `/bin/sh` script that stands in for an external tool.
 */
export async function writeStubExecutable(filePath: string, body: string): Promise<string> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
  return filePath;
}

/**
 * Creates a temporary test database path.
 */
export function getTempDbPath(): string {
  return path.join(process.cwd(), 'test-data', `test-${Date.now()}-${Math.random().toString(36).slice(2)}.db`);
}

/**
 * Creates a temporary working directory path.
 */
export function getTempDirectory(): string {
  return path.join(process.cwd(), 'test-data', `test-dir-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}
