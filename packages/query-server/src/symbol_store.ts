import Database from 'better-sqlite3';
import path from 'path';
import type { SymbolRecord } from '@tagstream/shared';
import { FileTable, makeLocation } from './location';
import { IndexSnapshot, SymbolIndex } from './symbol_index';
import { toSymbolKind } from './symbol_kinds';

interface SymbolRow {
  file_id: number;
  line: number;
  col: number;
  name: string;
  display_name: string | null;
  kind: string;
  kind_spelling: string | null;
  is_definition: number;
  start_line: number;
  start_col: number;
  end_line: number;
  end_col: number;
}

/** Read side of the persisted symbol database written by the indexer. */
export class SymbolStore {
  private db: Database.Database;
  constructor(source: string | Database.Database) {
    this.db = typeof source === 'string' ? new Database(path.resolve(source), { fileMustExist: false }) : source;
    this.bootstrap();
  }
  private bootstrap() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS files (
        id INTEGER PRIMARY KEY,
        path TEXT UNIQUE
      );
      CREATE TABLE IF NOT EXISTS symbols (
        id INTEGER PRIMARY KEY,
        file_id INTEGER NOT NULL,
        line INTEGER NOT NULL,
        col INTEGER NOT NULL,
        name TEXT NOT NULL,
        display_name TEXT,
        kind TEXT NOT NULL,
        kind_spelling TEXT,
        is_definition INTEGER NOT NULL DEFAULT 0,
        start_line INTEGER NOT NULL,
        start_col INTEGER NOT NULL,
        end_line INTEGER NOT NULL,
        end_col INTEGER NOT NULL,
        FOREIGN KEY(file_id) REFERENCES files(id)
      );
      CREATE INDEX IF NOT EXISTS symbols_location ON symbols(file_id, line, col);
    `);
  }
  get database(): Database.Database {
    return this.db;
  }
  load(root?: string): IndexSnapshot {
    const files = new FileTable();
    const fileRows = this.db.prepare('SELECT id, path FROM files ORDER BY id').all() as Array<{ id: number; path: string }>;
    for (const row of fileRows) files.register(row.path, row.id);
    const rows = this.db
      .prepare('SELECT file_id, line, col, name, display_name, kind, kind_spelling, is_definition, start_line, start_col, end_line, end_col FROM symbols')
      .all() as SymbolRow[];
    const records = rows.map((r): SymbolRecord => ({
      location: makeLocation(r.file_id, r.line, r.col),
      symbolName: r.name,
      displayName: r.display_name ?? r.name,
      kind: toSymbolKind(r.kind),
      kindSpelling: r.kind_spelling ?? r.kind,
      isDefinition: r.is_definition !== 0,
      startLine: r.start_line,
      startColumn: r.start_col,
      endLine: r.end_line,
      endColumn: r.end_col,
    }));
    return { files, symbols: SymbolIndex.fromRecords(records), root };
  }
  close() {
    this.db.close();
  }
}
