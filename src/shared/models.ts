/**
 * Mono audio decoded at a fixed analysis rate.
 */
export interface DecodedAudio {
  /** Normalised amplitudes in the -1..1 range. */
  samples: Float32Array;
  /** Samples per second. */
  sampleRate: number;
  /** Length in seconds (samples.length / sampleRate). */
  duration: number;
}

/**
 * Time range of a source track used for the playable excerpt.
 */
export interface PreviewWindow {
  /** Offset into the source in seconds. */
  startOffset: number;
  /** Excerpt length in seconds, capped at the source duration. */
  duration: number;
}

/**
 * 8-bit red, green and blue components.
 */
export type RgbColor = readonly [number, number, number];

/**
 * Packed RGB raster, row-major, three bytes per pixel.
 */
export interface RenderedImage {
  width: number;
  height: number;
  data: Uint8Array;
}

/**
 * Options accepted by the waveform renderer. Every field is optional.
 */
export interface WaveformRenderOptions {
  /** Pixel columns (default 800). */
  width?: number;
  /** Pixel rows (default 400). */
  height?: number;
  /** Fill colour behind the bars (default dark navy). */
  backgroundColor?: RgbColor;
  /** Bar colour (default indigo). */
  waveColor?: RgbColor;
}

/**
 * Per-run overrides for preview generation.
 */
export interface PreviewOptions extends WaveformRenderOptions {
  /** Length of the excerpt in seconds (default 30). */
  previewDuration?: number;
  /** Explicit start offset in seconds; skips energy-based window selection when set. */
  startOffset?: number;
}

/**
 * Audio file referenced by a music-production project, as reported by the project parser.
 */
export interface AudioClipReference {
  /** Absolute path resolved against the project file location. */
  path: string;
  /** Path as written inside the project file. */
  relativePath: string;
  /** Clip length in seconds as recorded by the project, 0 when unknown. */
  duration: number;
  /** Whether the referenced file was present when the project was parsed. */
  exists: boolean;
}

/**
 * Metadata extracted from a project file by the external parser.
 */
export interface ParsedProject {
  /** Project name, usually the project file's base name. */
  name: string;
  /** Absolute path of the project file. */
  projectPath: string;
  /** Tempo rounded to an integer, when the project declares one. */
  bpm: number | null;
  /** Audio clips referenced by the project. */
  audioClips: AudioClipReference[];
}

/**
 * Stored view of a project and its generated assets.
 */
export interface ProjectAssetRecord {
  /** Unique identifier inside the store. */
  id: number;
  /** Display name of the project. */
  name: string;
  /** Project file (or standalone audio file) the record was imported from. */
  projectPath: string;
  /** Audio file the preview and cover were generated from. */
  sourcePath: string | null;
  /** Number of audio clips the project references. */
  audioClipCount: number;
  /** Tempo if known. */
  bpm: number | null;
  /** Generated MP3 preview, null until generation succeeds. */
  previewPath: string | null;
  /** Generated waveform PNG, null until generation succeeds. */
  coverPath: string | null;
  /** Last update timestamp (epoch milliseconds). */
  updatedAt: number;
}

/**
 * Outcome of one asset generation run. A step that failed leaves its path null.
 */
export interface AssetGenerationResult {
  projectId: number;
  /** Start offset the preview was cut from, in seconds. */
  startOffset: number;
  previewPath: string | null;
  coverPath: string | null;
  /** Messages of the steps that failed and were skipped. */
  failures: string[];
}

/**
 * Persisted configuration.
 */
export interface AppSettings {
  /** Root folder holding previews/, covers/ and the database. */
  dataDirectory: string | null;
  /** Executable used for transcoding and non-WAV decoding. */
  ffmpegPath: string;
  /** Excerpt length in seconds. */
  previewDuration: number;
  /** Cover width in pixels. */
  waveformWidth: number;
  /** Cover height in pixels. */
  waveformHeight: number;
  /** Kill the transcoder after this many milliseconds, null for no limit. */
  transcodeTimeoutMs: number | null;
}
