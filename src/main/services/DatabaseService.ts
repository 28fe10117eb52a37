/**
 * Thin wrapper around better-sqlite3 providing schema setup and the project/settings helpers
 * used by the asset pipeline.
 */
import Database, { Database as BetterSqliteDatabase } from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { ProjectAssetRecord } from '../../shared/models';
import { AssetPathUpdate, ProjectRecordInput, ProjectRecordStore } from './ProjectRecordStore';

type DbRow = Record<string, unknown>;

/**
 * Handles persistence for project records and settings.
 */
export class DatabaseService implements ProjectRecordStore {
  private db: BetterSqliteDatabase | null = null;

  public constructor(private readonly dbFilePath: string) {}

  /**
   * Opens the database connection (creating the file if necessary) and ensures the schema exists.
   */
  public initialize(): void {
    const folder = path.dirname(this.dbFilePath);
    if (!fs.existsSync(folder)) {
      fs.mkdirSync(folder, { recursive: true });
    }
    this.db = new Database(this.dbFilePath);
    this.db.pragma('journal_mode = WAL');
    this.applySchema();
  }

  /**
   * Closes the active database connection.
   */
  public close(): void {
    this.db?.close();
    this.db = null;
  }

  /**
   * Persists or refreshes a project row and returns the stored record.
   * Generated asset paths survive a refresh.
   */
  public upsertProject(input: ProjectRecordInput): ProjectAssetRecord {
    const row = this.requireDb()
      .prepare(
        `INSERT INTO projects (
          name,
          project_path,
          source_path,
          audio_clip_count,
          bpm,
          updated_at
        ) VALUES (
          @name,
          @projectPath,
          @sourcePath,
          @audioClipCount,
          @bpm,
          @updatedAt
        )
        ON CONFLICT(project_path) DO UPDATE SET
          name = excluded.name,
          source_path = excluded.source_path,
          audio_clip_count = excluded.audio_clip_count,
          bpm = excluded.bpm,
          updated_at = excluded.updated_at
        RETURNING *`
      )
      .get({
        name: input.name,
        projectPath: input.projectPath,
        sourcePath: input.sourcePath,
        audioClipCount: input.audioClipCount,
        bpm: input.bpm,
        updatedAt: Date.now()
      }) as DbRow | undefined;

    if (!row) {
      throw new Error('Failed to persist project record.');
    }
    return this.mapProjectRow(row);
  }

  /**
   * Returns a single project row by id.
   */
  public getProjectById(projectId: number): ProjectAssetRecord {
    const row = this.requireDb()
      .prepare('SELECT * FROM projects WHERE id = ?')
      .get(projectId) as DbRow | undefined;
    if (!row) {
      throw new Error(`Project with id ${projectId} not found`);
    }
    return this.mapProjectRow(row);
  }

  public findProjectByPath(projectPath: string): ProjectAssetRecord | null {
    const row = this.requireDb()
      .prepare('SELECT * FROM projects WHERE project_path = ?')
      .get(projectPath) as DbRow | undefined;
    return row ? this.mapProjectRow(row) : null;
  }

  /**
   * Lists projects, most recently updated first.
   */
  public listProjects(): ProjectAssetRecord[] {
    const rows = this.requireDb()
      .prepare('SELECT * FROM projects ORDER BY updated_at DESC, id DESC')
      .all() as DbRow[];
    return rows.map((row) => this.mapProjectRow(row));
  }

  /**
   * Stores the generated preview and cover paths (null clears a path).
   */
  public updateAssetPaths(projectId: number, update: AssetPathUpdate): ProjectAssetRecord {
    const row = this.requireDb()
      .prepare(
        `UPDATE projects
           SET preview_path = @previewPath,
               cover_path = @coverPath,
               updated_at = @updatedAt
         WHERE id = @id
         RETURNING *`
      )
      .get({
        id: projectId,
        previewPath: update.previewPath,
        coverPath: update.coverPath,
        updatedAt: Date.now()
      }) as DbRow | undefined;
    if (!row) {
      throw new Error(`Project with id ${projectId} not found`);
    }
    return this.mapProjectRow(row);
  }

  /**
   * Deletes a project record permanently.
   */
  public deleteProject(projectId: number): void {
    this.requireDb().prepare('DELETE FROM projects WHERE id = ?').run(projectId);
  }

  /**
   * Reads every stored setting as raw JSON text keyed by name.
   */
  public getSettingValues(): Map<string, string> {
    const rows = this.requireDb().prepare('SELECT key, value FROM settings').all() as DbRow[];
    const map = new Map<string, string>();
    for (const row of rows) {
      const key = row.key as string | undefined;
      const value = row.value as string | undefined;
      if (key && typeof value === 'string') {
        map.set(key, value);
      }
    }
    return map;
  }

  /**
   * Persists a single setting, JSON encoded.
   */
  public setSetting(key: string, value: unknown): void {
    this.requireDb()
      .prepare(
        `INSERT INTO settings (key, value) VALUES (@key, @value)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value`
      )
      .run({ key, value: JSON.stringify(value) });
  }

  /**
   * Maps a raw database row to the strongly typed record shape.
   */
  private mapProjectRow(row: DbRow): ProjectAssetRecord {
    return {
      id: row.id as number,
      name: row.name as string,
      projectPath: row.project_path as string,
      sourcePath: typeof row.source_path === 'string' ? row.source_path : null,
      audioClipCount: typeof row.audio_clip_count === 'number' ? row.audio_clip_count : 0,
      bpm: typeof row.bpm === 'number' ? row.bpm : null,
      previewPath: typeof row.preview_path === 'string' ? row.preview_path : null,
      coverPath: typeof row.cover_path === 'string' ? row.cover_path : null,
      updatedAt: row.updated_at as number
    };
  }

  /**
   * Lazy accessor ensuring the database has been initialised.
   */
  private requireDb(): BetterSqliteDatabase {
    if (!this.db) {
      throw new Error('Database connection has not been initialised.');
    }
    return this.db;
  }

  /**
   * Applies the schema for the application.
   */
  private applySchema(): void {
    const connection = this.requireDb();
    connection.exec(`
      CREATE TABLE IF NOT EXISTS projects (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        project_path TEXT NOT NULL UNIQUE,
        source_path TEXT,
        audio_clip_count INTEGER NOT NULL DEFAULT 0,
        bpm INTEGER,
        preview_path TEXT,
        cover_path TEXT,
        updated_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_projects_updated ON projects(updated_at);

      CREATE TABLE IF NOT EXISTS settings (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
    `);
  }
}
