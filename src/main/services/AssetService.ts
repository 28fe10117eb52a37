import fs from 'node:fs/promises';
import path from 'node:path';
import {
  AssetGenerationResult,
  AudioClipReference,
  DecodedAudio,
  ParsedProject,
  PreviewOptions,
  PreviewWindow,
  ProjectAssetRecord,
  WaveformRenderOptions
} from '../../shared/models';
import { describeError } from '../errors';
import { assertSourceExists, takeLeadingSeconds } from '../utils/audioFiles';
import { ANALYSIS_SAMPLE_RATE, AudioDecoder } from './AudioDecoder';
import { writePng } from './ImageWriter';
import { PreviewExtractor } from './PreviewExtractor';
import { DEFAULT_PREVIEW_DURATION, resolvePreviewWindow, selectPreviewStart } from './PreviewWindowSelector';
import { ProjectRecordStore } from './ProjectRecordStore';
import { renderWaveform } from './WaveformRenderer';

export interface AssetServiceConfig extends WaveformRenderOptions {
  /** Root folder; previews/ and covers/ are created beneath it. */
  dataDirectory: string;
  /** Default excerpt length in seconds. */
  previewDuration?: number;
}

export interface ProjectImportResult {
  record: ProjectAssetRecord;
  /** Null when the project references no existing audio. */
  assets: AssetGenerationResult | null;
}

/**
 * Picks the longest referenced clip whose file exists, or null when there is none.
 */
export function pickPreviewSource(clips: AudioClipReference[]): AudioClipReference | null {
  let longest: AudioClipReference | null = null;
  for (const clip of clips) {
    if (!clip.exists) {
      continue;
    }
    if (!longest || clip.duration > longest.duration) {
      longest = clip;
    }
  }
  return longest;
}

/**
 * Generates preview excerpts and waveform covers for catalogued projects and records the results.
 */
export class AssetService {
  private readonly previewDuration: number;

  public constructor(
    private readonly store: ProjectRecordStore,
    private readonly decoder: AudioDecoder,
    private readonly extractor: PreviewExtractor,
    private readonly config: AssetServiceConfig
  ) {
    this.previewDuration = config.previewDuration ?? DEFAULT_PREVIEW_DURATION;
  }

  /**
   * Output locations for a project: previews/<id>.mp3 and covers/<id>.png under the data directory.
   */
  public resolveAssetPaths(projectId: number): { previewPath: string; coverPath: string } {
    return {
      previewPath: path.join(this.config.dataDirectory, 'previews', `${projectId}.mp3`),
      coverPath: path.join(this.config.dataDirectory, 'covers', `${projectId}.png`)
    };
  }

  /**
   * Produces the preview excerpt and the waveform cover for one project.
   *
   * Each output is attempted independently: a failed step is logged, reported in
   * `failures` and leaves the previously stored path untouched. Window selection that
   * cannot decode the source falls back to a start of 0.
   */
  public async generateAssets(
    projectId: number,
    sourcePath: string,
    options: PreviewOptions = {}
  ): Promise<AssetGenerationResult> {
    const startTime = performance.now();
    const record = this.store.getProjectById(projectId);
    const targets = this.resolveAssetPaths(projectId);
    const previewDuration = options.previewDuration ?? this.previewDuration;
    const failures: string[] = [];
    console.log(`Generating assets for project ${projectId} (${record.name}) from ${sourcePath}`);

    let fullAudio: DecodedAudio | null = null;
    let window: PreviewWindow = { startOffset: options.startOffset ?? 0, duration: previewDuration };
    if (options.startOffset === undefined) {
      try {
        fullAudio = await this.decoder.decode(sourcePath, { sampleRate: ANALYSIS_SAMPLE_RATE });
        const startOffset = selectPreviewStart(fullAudio, previewDuration);
        window = resolvePreviewWindow(startOffset, previewDuration, fullAudio.duration);
      } catch (error) {
        console.warn('Failed to find best preview start, using 0', { projectId, sourcePath, error: describeError(error) });
      }
    }

    let previewPath: string | null = null;
    try {
      if (window.duration > 0) {
        previewPath = await this.extractor.extractPreview(sourcePath, targets.previewPath, window.startOffset, window.duration);
      } else {
        failures.push('preview: source contains no audio');
      }
    } catch (error) {
      failures.push(`preview: ${describeError(error)}`);
      console.warn('Failed to generate audio preview', { projectId, sourcePath, error: describeError(error) });
    }

    let coverPath: string | null = null;
    try {
      const coverAudio = fullAudio
        ? takeLeadingSeconds(fullAudio, previewDuration)
        : await this.decoder.decode(sourcePath, { sampleRate: ANALYSIS_SAMPLE_RATE, maxDuration: previewDuration });
      const image = renderWaveform(coverAudio, {
        width: options.width ?? this.config.width,
        height: options.height ?? this.config.height,
        backgroundColor: options.backgroundColor ?? this.config.backgroundColor,
        waveColor: options.waveColor ?? this.config.waveColor
      });
      coverPath = await writePng(image, targets.coverPath);
    } catch (error) {
      failures.push(`cover: ${describeError(error)}`);
      console.warn('Failed to generate waveform cover', { projectId, sourcePath, error: describeError(error) });
    }

    this.store.updateAssetPaths(projectId, {
      previewPath: previewPath ?? record.previewPath,
      coverPath: coverPath ?? record.coverPath
    });

    const totalTime = performance.now() - startTime;
    console.log(
      `Assets for project ${projectId}: ${totalTime.toFixed(1)}ms (start ${window.startOffset.toFixed(2)}s, ${failures.length} failure(s))`
    );

    return {
      projectId,
      startOffset: window.startOffset,
      previewPath,
      coverPath,
      failures
    };
  }

  /**
   * Records a parsed project and generates its assets from the longest existing clip.
   */
  public async importProject(project: ParsedProject, options: PreviewOptions = {}): Promise<ProjectImportResult> {
    const source = pickPreviewSource(project.audioClips);
    const record = this.store.upsertProject({
      name: project.name,
      projectPath: project.projectPath,
      sourcePath: source?.path ?? null,
      audioClipCount: project.audioClips.length,
      bpm: project.bpm
    });

    if (!source) {
      console.log(`No audio clips found for ${project.name}, skipping preview generation`);
      return { record, assets: null };
    }

    const assets = await this.generateAssets(record.id, source.path, options);
    return { record: this.store.getProjectById(record.id), assets };
  }

  /**
   * Catalogues a standalone audio file as its own project.
   */
  public async importAudioFile(audioPath: string, name?: string, options: PreviewOptions = {}): Promise<ProjectImportResult> {
    const absolutePath = path.resolve(audioPath);
    await assertSourceExists(absolutePath);
    const fileName = path.basename(absolutePath);
    return this.importProject({
      name: name ?? path.basename(fileName, path.extname(fileName)),
      projectPath: absolutePath,
      bpm: null,
      audioClips: [{ path: absolutePath, relativePath: fileName, duration: 0, exists: true }]
    }, options);
  }

  /**
   * Deletes a project's generated files and its record.
   */
  public async removeProjectAssets(projectId: number): Promise<void> {
    const record = this.store.getProjectById(projectId);
    for (const assetPath of [record.previewPath, record.coverPath]) {
      if (assetPath) {
        await fs.rm(assetPath, { force: true });
      }
    }
    this.store.deleteProject(projectId);
    console.log(`Removed project ${projectId} (${record.name})`);
  }
}
