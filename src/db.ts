import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { findSqlFunction, invokeSqlFunction, SQL_FUNCTIONS } from "./services/functions.js";
import { DateOperations } from "./services/operations.js";
import type { SqlValue } from "./types.js";

const IN_MEMORY = ":memory:";

/**
 * SQLite connection with every date function registered on it. The
 * database keeps no tables of its own; it only hosts the functions.
 */
export class AppDatabase {
  private readonly db: Database.Database;

  constructor(
    dbPath: string,
    readonly ops: DateOperations = new DateOperations()
  ) {
    if (dbPath === IN_MEMORY) {
      this.db = new Database(IN_MEMORY);
    } else {
      const resolved = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
      this.db = new Database(resolved);
      this.db.pragma("journal_mode = WAL");
    }

    this.registerFunctions();
  }

  close(): void {
    this.db.close();
  }

  /** Evaluates `SELECT name(?, ...)` and returns the single value. */
  callFunction(name: string, args: readonly SqlValue[]): SqlValue {
    const definition = findSqlFunction(name);
    if (!definition) {
      throw new Error(`Unknown SQL function ${name}`);
    }

    const placeholders = args.map(() => "?").join(", ");
    const value: unknown = this.db.prepare(`SELECT ${definition.name}(${placeholders})`).pluck().get(...args);

    return toSqlValue(value);
  }

  query(sql: string, params: readonly SqlValue[] = []): unknown[] {
    return this.db.prepare(sql).all(...params);
  }

  private registerFunctions(): void {
    for (const definition of SQL_FUNCTIONS) {
      this.db.function(
        definition.name,
        { deterministic: definition.deterministic, varargs: true },
        (...values: SqlValue[]) => invokeSqlFunction(this.ops, definition, values)
      );
    }
  }
}

function toSqlValue(value: unknown): SqlValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    Buffer.isBuffer(value)
  ) {
    return value;
  }

  throw new TypeError(`Unexpected SQL result ${String(value)}`);
}
