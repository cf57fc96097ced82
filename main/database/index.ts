import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import { getLogger } from "../services/logger";
import { ErrorCode, ServiceError, toErrorMessage } from "@shared/errors";
import * as schema from "./schema";

export type DrizzleDB = BetterSQLite3Database<typeof schema>;

export interface OpenStoreOptions {
  /** Open without write access; the file must already exist */
  readonly?: boolean;
}

/**
 * One host shard: a SQLite file plus its Drizzle instance.
 * Writers open their own shard; the aggregator opens many read-only.
 */
export class ShardStore {
  private readonly logger = getLogger("database");
  private closed = false;

  private constructor(
    readonly path: string,
    readonly readOnly: boolean,
    private readonly sqlite: Database.Database,
    readonly db: DrizzleDB
  ) {}

  /**
   * Open (and for writers create and bootstrap) the store at `dbPath`.
   * Pass ":memory:" for an in-process store.
   */
  static open(dbPath: string, options: OpenStoreOptions = {}): ShardStore {
    const readonly = options.readonly ?? false;
    const inMemory = dbPath === ":memory:";

    if (!readonly && !inMemory) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    let sqlite: Database.Database;
    try {
      sqlite = readonly
        ? new Database(dbPath, { readonly: true, fileMustExist: true })
        : new Database(dbPath);
    } catch (error) {
      throw new ServiceError(
        ErrorCode.STORE_UNAVAILABLE,
        `Cannot open store at ${dbPath}: ${toErrorMessage(error)}`,
        error
      );
    }

    if (!readonly) {
      // WAL lets the observer and the analyzer share a shard
      if (!inMemory) {
        sqlite.pragma("journal_mode = WAL");
      }
      sqlite.pragma("foreign_keys = ON");
      sqlite.pragma("busy_timeout = 5000");
      for (const statement of schema.SCHEMA_STATEMENTS) {
        sqlite.prepare(statement).run();
      }
    }

    const store = new ShardStore(dbPath, readonly, sqlite, drizzle(sqlite, { schema }));
    store.logger.debug({ dbPath, readonly }, "Store opened");
    return store;
  }

  isOpen(): boolean {
    return !this.closed;
  }

  close(): void {
    if (this.closed) return;
    this.sqlite.close();
    this.closed = true;
    this.logger.debug({ dbPath: this.path }, "Store closed");
  }
}

export * from "./schema";
