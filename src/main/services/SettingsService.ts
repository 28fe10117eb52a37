import fs from 'node:fs';
import path from 'node:path';
import { AppSettings } from '../../shared/models';
import { DatabaseService } from './DatabaseService';
import { DEFAULT_PREVIEW_DURATION } from './PreviewWindowSelector';
import { DEFAULT_WAVEFORM_HEIGHT, DEFAULT_WAVEFORM_WIDTH } from './WaveformRenderer';

export const DEFAULT_SETTINGS: AppSettings = {
  dataDirectory: null,
  ffmpegPath: 'ffmpeg',
  previewDuration: DEFAULT_PREVIEW_DURATION,
  waveformWidth: DEFAULT_WAVEFORM_WIDTH,
  waveformHeight: DEFAULT_WAVEFORM_HEIGHT,
  transcodeTimeoutMs: null
};

/**
 * Manages persistent pipeline settings backed by the SQLite database.
 */
export class SettingsService {
  public constructor(private readonly database: DatabaseService) {}

  /**
   * Reads the current settings snapshot, falling back to defaults for absent or malformed values.
   */
  public getSettings(): AppSettings {
    const stored = this.database.getSettingValues();
    return {
      dataDirectory: this.readValue(stored, 'dataDirectory', isString, DEFAULT_SETTINGS.dataDirectory),
      ffmpegPath: this.readValue(stored, 'ffmpegPath', isNonEmptyString, DEFAULT_SETTINGS.ffmpegPath),
      previewDuration: this.readValue(stored, 'previewDuration', isPositiveNumber, DEFAULT_SETTINGS.previewDuration),
      waveformWidth: this.readValue(stored, 'waveformWidth', isPositiveInteger, DEFAULT_SETTINGS.waveformWidth),
      waveformHeight: this.readValue(stored, 'waveformHeight', isPositiveInteger, DEFAULT_SETTINGS.waveformHeight),
      transcodeTimeoutMs: this.readValue(stored, 'transcodeTimeoutMs', isPositiveNumber, DEFAULT_SETTINGS.transcodeTimeoutMs)
    };
  }

  /**
   * Persists one setting and returns the refreshed snapshot.
   */
  public updateSetting<K extends keyof AppSettings>(key: K, value: AppSettings[K]): AppSettings {
    this.database.setSetting(key, value);
    return this.getSettings();
  }

  /**
   * Ensures there is a data directory stored, defaulting to ./data under the working directory.
   */
  public ensureDataDirectory(): string {
    const configured = this.getSettings().dataDirectory;
    if (configured) {
      this.ensureDirectory(configured);
      return configured;
    }
    const defaultPath = path.resolve(process.cwd(), 'data');
    this.ensureDirectory(defaultPath);
    this.database.setSetting('dataDirectory', defaultPath);
    return defaultPath;
  }

  /**
   * Updates the stored data directory after normalising it.
   */
  public updateDataDirectory(targetPath: string): AppSettings {
    const normalised = path.resolve(targetPath);
    this.ensureDirectory(normalised);
    return this.updateSetting('dataDirectory', normalised);
  }

  private readValue<T, F>(
    stored: Map<string, string>,
    key: keyof AppSettings,
    guard: (value: unknown) => value is T,
    fallback: F
  ): T | F {
    const raw = stored.get(key);
    if (raw === undefined) {
      return fallback;
    }
    try {
      const parsed = JSON.parse(raw) as unknown;
      return guard(parsed) ? parsed : fallback;
    } catch {
      console.warn(`Ignoring malformed setting ${key}`, raw);
      return fallback;
    }
  }

  /**
   * Guarantees that the desired directory exists.
   */
  private ensureDirectory(dirPath: string): void {
    if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
    }
  }
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function isPositiveInteger(value: unknown): value is number {
  return isPositiveNumber(value) && Number.isInteger(value);
}
