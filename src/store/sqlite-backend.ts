/**
 * Secondary backend on a local SQLite file.
 *
 * Nearest-neighbour search is an exact cosine scan over the collection and
 * every filter is evaluated in process, so no payload field needs an index.
 * A `file_path` equality in `must` is pushed into SQL since the differ and
 * section expansion always scope by file.
 */

import type Database from 'better-sqlite3';
import { openDatabase } from '../database/connection.js';
import { blobToVector, vectorToBlob, type PointRow } from '../database/schema.js';
import {
  CountRowSchema,
  PointRowSchema,
  SchemaValidationError,
  validateRow,
} from '../database/validation.js';
import { BackendUnavailableError, CLIError } from '../errors/index.js';
import { safeJsonParse } from '../utils/json.js';
import { errorMessage } from '../utils/result.js';
import type { PointStoreBackend, RetrieveOptions, ScanOptions } from './backend.js';
import { matchesFilter, type PointFilter } from './filter.js';
import { formatPointId, parsePointId } from './ids.js';
import {
  ChunkPayloadSchema,
  type ChunkPayload,
  type PointRecord,
  type ScanPage,
  type ScoredPoint,
  type StoredPoint,
} from './types.js';
import { cosineSimilarity } from './vector.js';

export interface SqliteBackendOptions {
  /** Database file; ignored when `db` is given */
  path?: string;
  collection: string;
  db?: Database.Database;
}

/**
 * The `file_path` value of a `must` equality, if the filter has one.
 */
function fileScope(filter: PointFilter | undefined): string | null {
  for (const condition of filter?.must ?? []) {
    if (condition.key !== 'file_path') continue;
    const { match } = condition;
    if (typeof match === 'string') return match;
    if (typeof match === 'object' && 'value' in match && typeof match.value === 'string') {
      return match.value;
    }
  }
  return null;
}

/**
 * True when SQL alone decides the filter: no filter, or nothing but the
 * `file_path` equality that fileScope pushes down.
 */
function fullyPushedDown(filter: PointFilter | undefined): boolean {
  if (!filter) return true;
  const { must = [], should = [], must_not = [] } = filter;
  return should.length === 0 && must_not.length === 0 && must.length === 1 && fileScope(filter) !== null;
}

export class SqliteBackend implements PointStoreBackend {
  readonly name = 'local' as const;
  private readonly db: Database.Database;
  private readonly collection: string;

  constructor(options: SqliteBackendOptions) {
    this.db = options.db ?? openDatabase(options.path);
    this.collection = options.collection;
  }

  /**
   * Run a statement block, reporting driver errors as BackendUnavailableError.
   * Schema mismatches are already CLIErrors and pass through.
   */
  private run<T>(operation: string, block: () => T): T {
    try {
      return block();
    } catch (error) {
      if (error instanceof CLIError) {
        throw error;
      }
      throw new BackendUnavailableError('local', `${operation} failed: ${errorMessage(error)}`, {
        details: { collection: this.collection, operation },
        cause: error,
      });
    }
  }

  private toPoint(row: PointRow, withVector: boolean | undefined): StoredPoint {
    const parsed = ChunkPayloadSchema.safeParse(safeJsonParse<unknown>(row.payload, {}));
    if (!parsed.success) {
      throw new SchemaValidationError(`Invalid payload for point ${row.id}`, parsed.error.issues);
    }
    const point: StoredPoint = { id: parsePointId(row.id), payload: parsed.data };
    if (withVector) {
      point.vector = blobToVector(row.vector);
    }
    return point;
  }

  /**
   * Rows of this collection, narrowed by file when the filter allows it,
   * in id order.
   */
  private selectRows(filter: PointFilter | undefined): PointRow[] {
    const filePath = fileScope(filter);
    const rows =
      filePath === null
        ? this.db
            .prepare('SELECT * FROM points WHERE collection = ? ORDER BY id')
            .all(this.collection)
        : this.db
            .prepare('SELECT * FROM points WHERE collection = ? AND file_path = ? ORDER BY id')
            .all(this.collection, filePath);
    return rows.map((row) => validateRow(PointRowSchema, row, `points(${this.collection})`));
  }

  private matchingPoints(filter: PointFilter | undefined, withVector: boolean): StoredPoint[] {
    return this.selectRows(filter)
      .map((row) => this.toPoint(row, withVector))
      .filter((point) => matchesFilter(point.payload, filter));
  }

  async ensureCollection(): Promise<void> {
    // Tables are created by the migrations when the database is opened
  }

  async upsert(points: PointRecord[]): Promise<void> {
    this.run('upsert', () => {
      const statement = this.db.prepare(`
        INSERT INTO points (id, collection, vector, payload, file_path, updated_at)
        VALUES (?, ?, ?, ?, ?, datetime('now'))
        ON CONFLICT (collection, id) DO UPDATE SET
          vector = excluded.vector,
          payload = excluded.payload,
          file_path = excluded.file_path,
          updated_at = excluded.updated_at
      `);
      this.db.transaction(() => {
        for (const point of points) {
          statement.run(
            formatPointId(point.id),
            this.collection,
            vectorToBlob(point.vector),
            JSON.stringify(point.payload),
            point.payload.file_path
          );
        }
      })();
    });
  }

  async retrieve(ids: bigint[], options: RetrieveOptions = {}): Promise<StoredPoint[]> {
    return this.run('retrieve', () => {
      const statement = this.db.prepare('SELECT * FROM points WHERE collection = ? AND id = ?');
      const points: StoredPoint[] = [];
      for (const id of ids) {
        const row = statement.get(this.collection, formatPointId(id));
        if (row) {
          points.push(
            this.toPoint(validateRow(PointRowSchema, row, `points.id=${id}`), options.withVector)
          );
        }
      }
      return points;
    });
  }

  async nearest(vector: number[], limit: number, filter?: PointFilter): Promise<ScoredPoint[]> {
    return this.run('nearest', () =>
      this.matchingPoints(filter, true)
        .map((point) => ({
          id: point.id,
          payload: point.payload,
          score: cosineSimilarity(vector, point.vector ?? []),
        }))
        .sort((a, b) => b.score - a.score)
        .slice(0, limit)
    );
  }

  /**
   * Pages in id order; the offset is the id of the last point returned.
   * SQL applies the file scope and the cursor, so a page reads only the
   * rows after the previous one.
   */
  async scan(options: ScanOptions): Promise<ScanPage> {
    return this.run('scan', () => {
      const filePath = fileScope(options.filter);
      const pushed = fullyPushedDown(options.filter);
      const clauses = ['collection = ?'];
      const params: Array<string | number> = [this.collection];
      if (filePath !== null) {
        clauses.push('file_path = ?');
        params.push(filePath);
      }
      if (options.offset) {
        clauses.push('id > ?');
        params.push(options.offset);
      }
      let sql = `SELECT * FROM points WHERE ${clauses.join(' AND ')} ORDER BY id`;
      if (pushed) {
        sql += ' LIMIT ?';
        params.push(options.limit + 1);
      }

      // One row past the page tells whether another page exists
      const rows: PointRow[] = [];
      const points: StoredPoint[] = [];
      for (const raw of this.db.prepare(sql).iterate(...params)) {
        const row = validateRow(PointRowSchema, raw, `points(${this.collection})`);
        const point = this.toPoint(row, options.withVector ?? false);
        if (!pushed && !matchesFilter(point.payload, options.filter)) continue;
        rows.push(row);
        points.push(point);
        if (points.length > options.limit) break;
      }

      const hasMore = points.length > options.limit;
      const lastRow = hasMore ? rows[options.limit - 1] : undefined;
      return {
        points: points.slice(0, options.limit),
        nextOffset: lastRow ? lastRow.id : null,
      };
    });
  }

  async setPayload(ids: bigint[], payload: Partial<ChunkPayload>): Promise<void> {
    this.run('setPayload', () => {
      const select = this.db.prepare('SELECT * FROM points WHERE collection = ? AND id = ?');
      const update = this.db.prepare(
        "UPDATE points SET payload = ?, file_path = ?, updated_at = datetime('now') WHERE collection = ? AND id = ?"
      );
      this.db.transaction(() => {
        for (const id of ids) {
          const key = formatPointId(id);
          const row = select.get(this.collection, key);
          if (!row) continue;
          const current = this.toPoint(validateRow(PointRowSchema, row, `points.id=${key}`), false);
          const merged: ChunkPayload = { ...current.payload, ...payload };
          update.run(JSON.stringify(merged), merged.file_path, this.collection, key);
        }
      })();
    });
  }

  async delete(ids: bigint[]): Promise<void> {
    this.run('delete', () => {
      const statement = this.db.prepare('DELETE FROM points WHERE collection = ? AND id = ?');
      this.db.transaction(() => {
        for (const id of ids) {
          statement.run(this.collection, formatPointId(id));
        }
      })();
    });
  }

  async count(filter?: PointFilter): Promise<number> {
    return this.run('count', () => {
      const filePath = fileScope(filter);
      if (filter && fullyPushedDown(filter) && filePath !== null) {
        const scoped = this.db
          .prepare('SELECT COUNT(*) AS count FROM points WHERE collection = ? AND file_path = ?')
          .get(this.collection, filePath);
        return validateRow(CountRowSchema, scoped, 'points.count').count;
      }
      if (filter) {
        return this.matchingPoints(filter, false).length;
      }
      const row = this.db
        .prepare('SELECT COUNT(*) AS count FROM points WHERE collection = ?')
        .get(this.collection);
      return validateRow(CountRowSchema, row, 'points.count').count;
    });
  }

  async deleteAll(): Promise<void> {
    this.run('deleteAll', () => {
      this.db.prepare('DELETE FROM points WHERE collection = ?').run(this.collection);
    });
  }
}
