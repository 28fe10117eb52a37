import path from 'node:path';
import { parseArgs } from 'node:util';
import { AppSettings, RgbColor } from '../shared/models';
import { NotFoundError, PreviewAssetError, ToolUnavailableError, describeError } from './errors';
import { ANALYSIS_SAMPLE_RATE, AudioDecoder, createDecoder } from './services/AudioDecoder';
import { AssetService } from './services/AssetService';
import { DatabaseService } from './services/DatabaseService';
import { FfmpegTranscoder } from './services/FfmpegTranscoder';
import { writePng } from './services/ImageWriter';
import { PreviewExtractor } from './services/PreviewExtractor';
import { resolvePreviewWindow, selectPreviewStart } from './services/PreviewWindowSelector';
import { DEFAULT_SETTINGS, SettingsService } from './services/SettingsService';
import { DEFAULT_BACKGROUND_COLOR, DEFAULT_WAVE_COLOR, renderWaveform } from './services/WaveformRenderer';
import { formatRgbColor, parseRgbColor } from './utils/colors';

export const DATABASE_FILE_NAME = 'release-preview.db';

const USAGE = `Usage: release-preview <command> [options]

Commands:
  window <audio>                 Print the start offset of the most energetic excerpt
  preview <audio> --out <mp3>    Write the trimmed MP3 excerpt
  waveform <audio> --out <png>   Write the waveform cover image
  assets <audio> [--name text]   Catalogue the file and write previews/<id>.mp3 and covers/<id>.png
  remove <id>                    Delete a catalogued project and its generated files
  config [key value]             Show settings or store one (value is JSON)

Options:
  --data-dir <dir>     Folder holding the database, previews/ and covers/ (default ./data)
  --duration <s>       Excerpt length in seconds (default ${DEFAULT_SETTINGS.previewDuration})
  --start <s>          Explicit start offset, skips energy analysis
  --width <px>         Cover width (default ${DEFAULT_SETTINGS.waveformWidth})
  --height <px>        Cover height (default ${DEFAULT_SETTINGS.waveformHeight})
  --background <rgb>   Cover background (default ${formatRgbColor(DEFAULT_BACKGROUND_COLOR)})
  --color <rgb>        Waveform colour (default ${formatRgbColor(DEFAULT_WAVE_COLOR)})`;

const CLI_OPTIONS = {
  out: { type: 'string', short: 'o' },
  'data-dir': { type: 'string' },
  duration: { type: 'string' },
  start: { type: 'string' },
  width: { type: 'string' },
  height: { type: 'string' },
  background: { type: 'string' },
  color: { type: 'string' },
  name: { type: 'string' },
  help: { type: 'boolean', short: 'h' }
} as const;

interface ParsedCli {
  command: string | undefined;
  positionals: string[];
  values: {
    out?: string;
    'data-dir'?: string;
    duration?: string;
    start?: string;
    width?: string;
    height?: string;
    background?: string;
    color?: string;
    name?: string;
    help?: boolean;
  };
}

/**
 * Command line coordinator: opens the settings database and wires the pipeline services.
 */
export class MainApp {
  private database: DatabaseService | null = null;
  private settingsService: SettingsService | null = null;

  /**
   * Runs one command and resolves with the process exit code.
   */
  public async run(argv: string[]): Promise<number> {
    let cli: ParsedCli;
    try {
      cli = this.parse(argv);
    } catch (error) {
      console.error(describeError(error));
      console.error(USAGE);
      return 1;
    }
    if (cli.values.help || !cli.command) {
      console.log(USAGE);
      return cli.values.help ? 0 : 1;
    }

    try {
      this.initialize(cli.values['data-dir']);
      await this.dispatch(cli);
      return 0;
    } catch (error) {
      if (error instanceof ToolUnavailableError) {
        console.error(`${error.tool} is not available. ${error.remediation}`);
      } else if (error instanceof PreviewAssetError) {
        console.error(`${error.code}: ${error.message}`);
      } else {
        console.error(describeError(error));
      }
      return 1;
    } finally {
      this.dispose();
    }
  }

  /**
   * Opens the database below the data directory and loads settings.
   */
  public initialize(dataDirectory?: string): void {
    const root = path.resolve(dataDirectory ?? path.join(process.cwd(), 'data'));
    this.database = new DatabaseService(path.join(root, DATABASE_FILE_NAME));
    this.database.initialize();
    this.settingsService = new SettingsService(this.database);
    if (dataDirectory) {
      this.settingsService.updateDataDirectory(root);
    }
  }

  /**
   * Closes the database connection.
   */
  public dispose(): void {
    this.database?.close();
    this.database = null;
    this.settingsService = null;
  }

  private parse(argv: string[]): ParsedCli {
    const { values, positionals } = parseArgs({ args: argv, options: CLI_OPTIONS, allowPositionals: true });
    const [command, ...rest] = positionals;
    return { command, positionals: rest, values };
  }

  private async dispatch(cli: ParsedCli): Promise<void> {
    const settingsService = this.requireSettings();
    const settings = settingsService.getSettings();
    const previewDuration = this.readNumber(cli.values.duration, '--duration') ?? settings.previewDuration;
    const decoder = createDecoder(settings.ffmpegPath);

    switch (cli.command) {
      case 'window': {
        const audioPath = this.requirePositional(cli, 'audio file');
        const audio = await decoder.decode(audioPath, { sampleRate: ANALYSIS_SAMPLE_RATE });
        const window = resolvePreviewWindow(selectPreviewStart(audio, previewDuration), previewDuration, audio.duration);
        console.log(`Best preview start: ${window.startOffset.toFixed(2)}s (excerpt ${window.duration.toFixed(2)}s of ${audio.duration.toFixed(2)}s)`);
        return;
      }
      case 'preview': {
        const audioPath = this.requirePositional(cli, 'audio file');
        const outputPath = this.requireOption(cli.values.out, '--out');
        const startOffset =
          this.readNumber(cli.values.start, '--start') ?? (await this.findStart(decoder, audioPath, previewDuration));
        await this.createExtractor(settings).extractPreview(audioPath, path.resolve(outputPath), startOffset, previewDuration);
        console.log(`Preview generated: ${outputPath} (start ${startOffset.toFixed(2)}s)`);
        return;
      }
      case 'waveform': {
        const audioPath = this.requirePositional(cli, 'audio file');
        const outputPath = this.requireOption(cli.values.out, '--out');
        const audio = await decoder.decode(audioPath, { sampleRate: ANALYSIS_SAMPLE_RATE, maxDuration: previewDuration });
        const image = renderWaveform(audio, {
          width: this.readNumber(cli.values.width, '--width') ?? settings.waveformWidth,
          height: this.readNumber(cli.values.height, '--height') ?? settings.waveformHeight,
          backgroundColor: this.readColor(cli.values.background),
          waveColor: this.readColor(cli.values.color)
        });
        await writePng(image, path.resolve(outputPath));
        console.log(`Waveform generated: ${outputPath}`);
        return;
      }
      case 'assets': {
        const audioPath = this.requirePositional(cli, 'audio file');
        const service = this.createAssetService(settings, decoder, previewDuration);
        const { record } = await service.importAudioFile(audioPath, cli.values.name, {
          startOffset: this.readNumber(cli.values.start, '--start'),
          width: this.readNumber(cli.values.width, '--width'),
          height: this.readNumber(cli.values.height, '--height'),
          backgroundColor: this.readColor(cli.values.background),
          waveColor: this.readColor(cli.values.color)
        });
        console.log(JSON.stringify(record, null, 2));
        return;
      }
      case 'remove': {
        const projectId = this.readNumber(this.requirePositional(cli, 'project id'), 'project id');
        if (projectId === undefined || !Number.isInteger(projectId)) {
          throw new Error('Project id must be an integer.');
        }
        await this.createAssetService(settings, decoder, previewDuration).removeProjectAssets(projectId);
        return;
      }
      case 'config': {
        const [key, rawValue] = cli.positionals;
        if (key !== undefined) {
          if (!this.isSettingKey(key) || rawValue === undefined) {
            throw new Error(`Usage: config <${Object.keys(DEFAULT_SETTINGS).join('|')}> <json value>`);
          }
          this.requireDatabase().setSetting(key, JSON.parse(rawValue) as unknown);
        }
        console.log(JSON.stringify(settingsService.getSettings(), null, 2));
        return;
      }
      default:
        throw new Error(`Unknown command "${cli.command ?? ''}".\n${USAGE}`);
    }
  }

  /**
   * Energy-based start offset; a source that cannot be decoded starts at 0.
   */
  private async findStart(decoder: AudioDecoder, audioPath: string, previewDuration: number): Promise<number> {
    try {
      const audio = await decoder.decode(audioPath, { sampleRate: ANALYSIS_SAMPLE_RATE });
      return selectPreviewStart(audio, previewDuration);
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw error;
      }
      console.warn(`Error finding best preview start for ${audioPath}, using 0:`, describeError(error));
      return 0;
    }
  }

  private createExtractor(settings: AppSettings): PreviewExtractor {
    return new PreviewExtractor(
      new FfmpegTranscoder({ ffmpegPath: settings.ffmpegPath, timeoutMs: settings.transcodeTimeoutMs })
    );
  }

  private createAssetService(settings: AppSettings, decoder: AudioDecoder, previewDuration: number): AssetService {
    return new AssetService(this.requireDatabase(), decoder, this.createExtractor(settings), {
      dataDirectory: this.requireSettings().ensureDataDirectory(),
      previewDuration,
      width: settings.waveformWidth,
      height: settings.waveformHeight
    });
  }

  private isSettingKey(key: string): key is keyof AppSettings {
    return Object.prototype.hasOwnProperty.call(DEFAULT_SETTINGS, key);
  }

  private readNumber(value: string | undefined, label: string): number | undefined {
    if (value === undefined) {
      return undefined;
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed < 0) {
      throw new Error(`${label} must be a non-negative number, received "${value}".`);
    }
    return parsed;
  }

  private readColor(value: string | undefined): RgbColor | undefined {
    return value === undefined ? undefined : parseRgbColor(value);
  }

  private requireOption(value: string | undefined, label: string): string {
    if (!value) {
      throw new Error(`Missing required option ${label}.`);
    }
    return value;
  }

  private requirePositional(cli: ParsedCli, label: string): string {
    const value = cli.positionals[0];
    if (!value) {
      throw new Error(`Missing ${label}.`);
    }
    return value;
  }

  private requireDatabase(): DatabaseService {
    if (!this.database) {
      throw new Error('Application has not been initialised.');
    }
    return this.database;
  }

  private requireSettings(): SettingsService {
    if (!this.settingsService) {
      throw new Error('Application has not been initialised.');
    }
    return this.settingsService;
  }
}
