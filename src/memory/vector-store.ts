import * as fs from 'fs';
import Database from 'better-sqlite3';
import { BackendUnavailableError, errorMessage, ValidationError } from '../core/errors.js';
import type { Embedder } from './embeddings.js';
import type { EntryMetadata } from './types.js';
import { EntryMetadataSchema } from './entry.js';

export interface IndexedDocument {
  id: string;
  text: string;
  metadata: EntryMetadata;
}

export interface QueryMatch extends IndexedDocument {
  similarity: number;
}

/**
 * Equality filter over metadata. Keys are dotted paths into the metadata
 * document (`tier`, `metadata.category`); `null` matches missing or null.
 */
export type WhereFilter = Record<string, string | number | boolean | null>;

export interface ListOptions {
  where?: WhereFilter;
  limit?: number;
}

/**
 * Similarity-indexed document collection, one per tier.
 */
export interface SimilaritySearch {
  readonly name: string;
  add(id: string, text: string, metadata: EntryMetadata): Promise<void>;
  query(text: string, k: number, where?: WhereFilter): Promise<QueryMatch[]>;
  get(ids: string[]): Promise<IndexedDocument[]>;
  list(options?: ListOptions): Promise<IndexedDocument[]>;
  /** Replaces the stored metadata; re-embeds when `text` is given. */
  update(id: string, metadata: EntryMetadata, text?: string): Promise<boolean>;
  delete(ids: string[]): Promise<number>;
  count(where?: WhereFilter): Promise<number>;
}

export interface CollectionProvider {
  collection(name: string): SimilaritySearch;
}

const WHERE_KEY = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

interface DocumentRow {
  id: string;
  content: string;
  metadata: string;
}

interface EmbeddedRow extends DocumentRow {
  embedding: Buffer;
}

function isSqliteConstraint(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('SQLITE_CONSTRAINT')
  );
}

export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dotProduct / denominator;
}

function toBlob(embedding: Float32Array): Buffer {
  return Buffer.from(embedding.buffer, embedding.byteOffset, embedding.byteLength);
}

function fromBlob(blob: Buffer): Float32Array {
  // Copy so the view is 4-byte aligned regardless of the source offset
  return new Float32Array(new Uint8Array(blob).buffer);
}

export function openDatabase(dbPath: string, label: string): Database.Database {
  try {
    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    return db;
  } catch (error) {
    throw new BackendUnavailableError(`${label} at ${dbPath}`, error);
  }
}

/**
 * Embedded SQLite document store with in-process cosine ranking.
 */
export class VectorStore implements CollectionProvider {
  private db: Database.Database;
  private collections = new Map<string, SimilaritySearch>();

  constructor(
    dbPath: string,
    private embedder: Embedder
  ) {
    this.db = openDatabase(dbPath, 'similarity index');
    try {
      this.runMigrations();
    } catch (error) {
      this.db.close();
      throw new BackendUnavailableError(`similarity index at ${dbPath}`, error);
    }

    if (dbPath !== ':memory:') {
      try {
        fs.chmodSync(dbPath, 0o600);
      } catch {
        // Not every filesystem supports modes; the store still works
      }
    }
  }

  private runMigrations(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        id INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT DEFAULT (datetime('now'))
      );
    `);

    const appliedMigrations = new Set(
      this.db.prepare('SELECT name FROM migrations').all()
        .map((row) => (row as { name: string }).name)
    );

    if (!appliedMigrations.has('001_documents')) {
      this.db.exec(`
        CREATE TABLE documents (
          collection TEXT NOT NULL,
          id TEXT NOT NULL,
          content TEXT NOT NULL,
          metadata TEXT NOT NULL DEFAULT '{}',
          embedding BLOB NOT NULL,
          dimensions INTEGER NOT NULL,
          updated_at TEXT DEFAULT (datetime('now')),
          PRIMARY KEY (collection, id)
        );

        CREATE INDEX idx_documents_collection ON documents(collection);
      `);

      this.db.prepare('INSERT INTO migrations (name) VALUES (?)').run('001_documents');
    }
  }

  get embedderName(): string {
    return this.embedder.name;
  }

  collection(name: string): SimilaritySearch {
    let collection = this.collections.get(name);
    if (!collection) {
      collection = new VectorCollection(name, this.db, this.embedder);
      this.collections.set(name, collection);
    }
    return collection;
  }

  close(): void {
    this.db.close();
  }
}

class VectorCollection implements SimilaritySearch {
  constructor(
    readonly name: string,
    private db: Database.Database,
    private embedder: Embedder
  ) {}

  async add(id: string, text: string, metadata: EntryMetadata): Promise<void> {
    const embedding = await this.embed(text);

    this.guard(() => {
      try {
        this.db.prepare(`
          INSERT INTO documents (collection, id, content, metadata, embedding, dimensions)
          VALUES (?, ?, ?, ?, ?, ?)
        `).run(this.name, id, text, JSON.stringify(metadata), toBlob(embedding), embedding.length);
      } catch (error) {
        if (isSqliteConstraint(error)) {
          throw new ValidationError(`Duplicate id in ${this.name}: ${id}`);
        }
        throw error;
      }
    });
  }

  async query(text: string, k: number, where?: WhereFilter): Promise<QueryMatch[]> {
    if (k <= 0) return [];

    const queryEmbedding = await this.embed(text);
    const { clause, params } = this.buildWhere(where);

    const rows = this.guard(() =>
      this.db.prepare(`
        SELECT id, content, metadata, embedding FROM documents
        WHERE collection = ?${clause}
        ORDER BY rowid ASC
      `).all(this.name, ...params) as EmbeddedRow[]
    );

    return rows
      .map((row) => ({
        ...this.rowToDocument(row),
        similarity: cosineSimilarity(queryEmbedding, fromBlob(row.embedding)),
      }))
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, k);
  }

  async get(ids: string[]): Promise<IndexedDocument[]> {
    if (ids.length === 0) return [];

    const placeholders = ids.map(() => '?').join(',');
    const rows = this.guard(() =>
      this.db.prepare(`
        SELECT id, content, metadata FROM documents
        WHERE collection = ? AND id IN (${placeholders})
      `).all(this.name, ...ids) as DocumentRow[]
    );

    // Preserve the caller's order
    const byId = new Map(rows.map((row) => [row.id, this.rowToDocument(row)]));
    return ids.flatMap((id) => {
      const doc = byId.get(id);
      return doc ? [doc] : [];
    });
  }

  async list(options: ListOptions = {}): Promise<IndexedDocument[]> {
    const { clause, params } = this.buildWhere(options.where);
    let sql = `SELECT id, content, metadata FROM documents WHERE collection = ?${clause} ORDER BY rowid ASC`;
    const allParams: Array<string | number> = [this.name, ...params];

    if (options.limit !== undefined) {
      sql += ' LIMIT ?';
      allParams.push(options.limit);
    }

    const rows = this.guard(() => this.db.prepare(sql).all(...allParams) as DocumentRow[]);
    return rows.map((row) => this.rowToDocument(row));
  }

  async update(id: string, metadata: EntryMetadata, text?: string): Promise<boolean> {
    if (text !== undefined) {
      const embedding = await this.embed(text);
      const result = this.guard(() =>
        this.db.prepare(`
          UPDATE documents
          SET content = ?, metadata = ?, embedding = ?, dimensions = ?, updated_at = datetime('now')
          WHERE collection = ? AND id = ?
        `).run(text, JSON.stringify(metadata), toBlob(embedding), embedding.length, this.name, id)
      );
      return result.changes > 0;
    }

    const result = this.guard(() =>
      this.db.prepare(`
        UPDATE documents SET metadata = ?, updated_at = datetime('now')
        WHERE collection = ? AND id = ?
      `).run(JSON.stringify(metadata), this.name, id)
    );
    return result.changes > 0;
  }

  async delete(ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;

    const placeholders = ids.map(() => '?').join(',');
    const result = this.guard(() =>
      this.db.prepare(`
        DELETE FROM documents WHERE collection = ? AND id IN (${placeholders})
      `).run(this.name, ...ids)
    );
    return result.changes;
  }

  async count(where?: WhereFilter): Promise<number> {
    const { clause, params } = this.buildWhere(where);
    const row = this.guard(() =>
      this.db.prepare(`
        SELECT COUNT(*) as count FROM documents WHERE collection = ?${clause}
      `).get(this.name, ...params) as { count: number }
    );
    return row.count;
  }

  private async embed(text: string): Promise<Float32Array> {
    try {
      return await this.embedder.embed(text);
    } catch (error) {
      if (error instanceof BackendUnavailableError) throw error;
      throw new BackendUnavailableError(`${this.embedder.name} embedder`, error);
    }
  }

  private buildWhere(where?: WhereFilter): { clause: string; params: Array<string | number> } {
    if (!where) return { clause: '', params: [] };

    let clause = '';
    const params: Array<string | number> = [];

    for (const [key, value] of Object.entries(where)) {
      if (!WHERE_KEY.test(key)) {
        throw new ValidationError(`Invalid filter key: ${key}`);
      }
      const path = `$.${key}`;

      if (value === null) {
        clause += ' AND json_extract(metadata, ?) IS NULL';
        params.push(path);
      } else if (typeof value === 'boolean') {
        // json_extract yields 1/0 for JSON true/false
        clause += ' AND json_extract(metadata, ?) = ?';
        params.push(path, value ? 1 : 0);
      } else {
        clause += ' AND json_extract(metadata, ?) = ?';
        params.push(path, value);
      }
    }

    return { clause, params };
  }

  private rowToDocument(row: DocumentRow): IndexedDocument {
    let raw: unknown;
    try {
      raw = JSON.parse(row.metadata);
    } catch (error) {
      throw new ValidationError(`Unreadable metadata of ${this.name}/${row.id}`, [errorMessage(error)]);
    }
    const parsed = EntryMetadataSchema.safeParse(raw);
    if (!parsed.success) {
      throw ValidationError.fromZod(`metadata of ${this.name}/${row.id}`, parsed.error);
    }
    return { id: row.id, text: row.content, metadata: parsed.data };
  }

  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof ValidationError) throw error;
      throw new BackendUnavailableError(`similarity index (${this.name})`, error);
    }
  }
}
