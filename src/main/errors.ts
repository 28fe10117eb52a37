export type PreviewAssetErrorCode = 'NOT_FOUND' | 'TOOL_UNAVAILABLE' | 'PROCESSING_FAILED';

/**
 * Base class for failures raised while decoding, trimming or rendering audio assets.
 */
export class PreviewAssetError extends Error {
  public constructor(
    public readonly code: PreviewAssetErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The source audio path did not exist when the operation started.
 */
export class NotFoundError extends PreviewAssetError {
  public constructor(public readonly path: string) {
    super('NOT_FOUND', `Audio file not found: ${path}`);
  }
}

/**
 * A required external binary is missing from the execution environment.
 */
export class ToolUnavailableError extends PreviewAssetError {
  public constructor(
    public readonly tool: string,
    public readonly remediation: string
  ) {
    super('TOOL_UNAVAILABLE', `${tool} not found. ${remediation}`);
  }
}

/**
 * An external tool or decoder ran but failed. `diagnostics` holds its output verbatim.
 */
export class ProcessingError extends PreviewAssetError {
  public constructor(
    message: string,
    public readonly diagnostics: string = ''
  ) {
    super('PROCESSING_FAILED', diagnostics ? `${message}: ${diagnostics}` : message);
  }
}

/**
 * Installation hint shown when ffmpeg cannot be spawned.
 */
export const FFMPEG_REMEDIATION =
  'Please install FFmpeg (macOS: brew install ffmpeg, Debian/Ubuntu: sudo apt install ffmpeg) ' +
  'or point the ffmpegPath setting at the binary.';

/**
 * Extracts a readable message from an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
