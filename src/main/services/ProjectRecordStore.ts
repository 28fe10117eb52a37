import { ProjectAssetRecord } from '../../shared/models';

export interface ProjectRecordInput {
  /** Display name. */
  name: string;
  /** Project file (or standalone audio file); unique per record. */
  projectPath: string;
  /** Audio file chosen for previews, null when the project has none. */
  sourcePath: string | null;
  /** Number of referenced audio clips. */
  audioClipCount: number;
  /** Tempo if known. */
  bpm: number | null;
}

export interface AssetPathUpdate {
  previewPath: string | null;
  coverPath: string | null;
}

/**
 * Record store the asset pipeline reads projects from and writes generated asset paths to.
 */
export interface ProjectRecordStore {
  /** Inserts or refreshes the record keyed by projectPath. Generated asset paths are kept. */
  upsertProject(input: ProjectRecordInput): ProjectAssetRecord;
  /** Throws when the id is unknown. */
  getProjectById(projectId: number): ProjectAssetRecord;
  updateAssetPaths(projectId: number, update: AssetPathUpdate): ProjectAssetRecord;
  deleteProject(projectId: number): void;
}
