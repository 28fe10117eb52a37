/**
 * Run with: node --import tsx --test src/test/AudioDecoder.test.ts
 */
import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import fs from 'node:fs/promises';
import path from 'node:path';
import { WaveFile } from 'wavefile';
import { NotFoundError, ProcessingError, ToolUnavailableError } from '../main/errors';
import { ANALYSIS_SAMPLE_RATE, createDecoder } from '../main/services/AudioDecoder';
import { buildDecodeArguments, parseFloat32Samples } from '../main/services/FfmpegDecoder';
import { WaveFileDecoder } from '../main/services/WaveFileDecoder';
import { TestWavGenerator, getTempDirectory } from './testHelpers';

const MISSING_FFMPEG = '/nonexistent/bin/ffmpeg-missing';

describe('AudioDecoder', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = getTempDirectory();
    await fs.mkdir(workDir, { recursive: true });
  });

  afterEach(async () => {
    await TestWavGenerator.cleanupTestDirectory(workDir);
  });

  describe('WaveFileDecoder', () => {
    it('should decode 16-bit PCM into normalised mono samples', async () => {
      const filePath = path.join(workDir, 'tone.wav');
      await TestWavGenerator.writeTestWav(filePath, { duration: 1, baseAmplitude: 0.5 });

      const audio = await new WaveFileDecoder().decode(filePath, { sampleRate: ANALYSIS_SAMPLE_RATE });

      assert.strictEqual(audio.sampleRate, 22050);
      assert.strictEqual(audio.samples.length, 22050);
      assert.strictEqual(audio.duration, 1);
      assert.strictEqual(audio.samples[0], 0.5);
      assert.ok(Math.abs((audio.samples[1] ?? 0) + 0.5) < 1e-3);
    });

    it('should decode 32-bit float data without rescaling', async () => {
      const filePath = path.join(workDir, 'float.wav');
      await TestWavGenerator.writeTestWav(filePath, { duration: 0.5, bitDepth: '32f', baseAmplitude: 0.25 });

      const audio = await new WaveFileDecoder().decode(filePath, { sampleRate: 22050 });

      assert.strictEqual(audio.samples.length, 11025);
      assert.strictEqual(audio.samples[0], 0.25);
      assert.strictEqual(audio.samples[1], -0.25);
    });

    it('should average channels into mono', async () => {
      const wav = new WaveFile();
      wav.fromScratch(2, 22050, '16', [
        [16384, 16384],
        [0, 0]
      ]);
      const filePath = path.join(workDir, 'stereo.wav');
      await fs.writeFile(filePath, Buffer.from(wav.toBuffer()));

      const audio = await new WaveFileDecoder().decode(filePath, { sampleRate: 22050 });

      assert.deepStrictEqual(Array.from(audio.samples), [0.25, 0.25]);
    });

    it('should stop at maxDuration', async () => {
      const filePath = path.join(workDir, 'long.wav');
      await TestWavGenerator.writeTestWav(filePath, { duration: 1 });

      const audio = await new WaveFileDecoder().decode(filePath, { sampleRate: 22050, maxDuration: 0.5 });

      assert.strictEqual(audio.samples.length, 11025);
      assert.strictEqual(audio.duration, 0.5);
    });

    it('should resample to the requested rate', async () => {
      const filePath = path.join(workDir, 'hires.wav');
      await TestWavGenerator.writeTestWav(filePath, { duration: 1, sampleRate: 44100 });

      const audio = await new WaveFileDecoder().decode(filePath, { sampleRate: 22050 });

      assert.strictEqual(audio.sampleRate, 22050);
      assert.ok(Math.abs(audio.samples.length - 22050) <= 2, `unexpected length ${audio.samples.length}`);
    });

    it('should reject a missing file with NotFoundError', async () => {
      const filePath = path.join(workDir, 'absent.wav');
      await assert.rejects(new WaveFileDecoder().decode(filePath, { sampleRate: 22050 }), (error: unknown) => {
        assert.ok(error instanceof NotFoundError);
        assert.strictEqual(error.path, filePath);
        assert.strictEqual(error.code, 'NOT_FOUND');
        return true;
      });
    });

    it('should reject unreadable content with ProcessingError', async () => {
      const filePath = path.join(workDir, 'broken.wav');
      await fs.writeFile(filePath, 'not a riff file at all');
      await assert.rejects(new WaveFileDecoder().decode(filePath, { sampleRate: 22050 }), ProcessingError);
    });
  });

  describe('createDecoder', () => {
    it('should decode WAV files without ffmpeg', async () => {
      const filePath = path.join(workDir, 'local.WAV');
      await TestWavGenerator.writeTestWav(filePath, { duration: 0.25 });

      const audio = await createDecoder(MISSING_FFMPEG).decode(filePath, { sampleRate: 22050 });

      assert.strictEqual(audio.samples.length, 5512);
    });

    it('should hand other formats to ffmpeg', async () => {
      const filePath = path.join(workDir, 'track.mp3');
      await fs.writeFile(filePath, 'placeholder');

      await assert.rejects(createDecoder(MISSING_FFMPEG).decode(filePath, { sampleRate: 22050 }), (error: unknown) => {
        assert.ok(error instanceof ToolUnavailableError);
        assert.strictEqual(error.tool, MISSING_FFMPEG);
        return true;
      });
    });

    it('should report a missing non-WAV source before spawning ffmpeg', async () => {
      const filePath = path.join(workDir, 'absent.aiff');
      await assert.rejects(createDecoder(MISSING_FFMPEG).decode(filePath, { sampleRate: 22050 }), NotFoundError);
    });
  });

  describe('FfmpegDecoder helpers', () => {
    it('should build mono float32 pipe arguments', () => {
      assert.deepStrictEqual(buildDecodeArguments('/music/song.mp3', { sampleRate: 22050 }), [
        '-v', 'error',
        '-i', '/music/song.mp3',
        '-vn',
        '-ac', '1',
        '-ar', '22050',
        '-f', 'f32le',
        'pipe:1'
      ]);
    });

    it('should limit the decoded length when maxDuration is set', () => {
      const args = buildDecodeArguments('/music/song.mp3', { sampleRate: 22050, maxDuration: 30 });
      assert.deepStrictEqual(args.slice(0, 6), ['-v', 'error', '-i', '/music/song.mp3', '-t', '30']);
    });

    it('should parse little-endian floats and clamp them', () => {
      const buffer = Buffer.alloc(14);
      buffer.writeFloatLE(0.5, 0);
      buffer.writeFloatLE(2, 4);
      buffer.writeFloatLE(Number.NaN, 8);

      assert.deepStrictEqual(Array.from(parseFloat32Samples(buffer)), [0.5, 1, 0]);
    });
  });
});
