import Database from 'better-sqlite3';
import { ConnectionError, SchemaError, errorMessage } from './errors';
import type { DbParams } from './types';

export function openDatabase(params: DbParams): Database.Database {
  const options: Database.Options = {};
  if (params.readonly !== undefined) options.readonly = params.readonly;
  if (params.fileMustExist !== undefined) options.fileMustExist = params.fileMustExist;
  if (params.timeout !== undefined) options.timeout = params.timeout;

  let db: Database.Database;
  try {
    db = new Database(params.database, options);
  } catch (error) {
    throw new ConnectionError(`Cannot open database ${params.database}: ${errorMessage(error)}`, { cause: error });
  }

  // SQLite's LIKE only folds ASCII; casefold() lets name searches ignore case for Cyrillic too.
  db.function('casefold', { deterministic: true }, (value: unknown) =>
    typeof value === 'string' ? value.toLowerCase() : value
  );

  return db;
}

export function createTables(db: Database.Database): void {
  try {
    db.pragma('foreign_keys = ON');

    db.exec(`
      CREATE TABLE IF NOT EXISTS companies (
        id INT PRIMARY KEY,
        name VARCHAR(255) UNIQUE NOT NULL,
        url TEXT
      )
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS vacancies (
        id INT PRIMARY KEY,
        company_id INT REFERENCES companies(id),
        name VARCHAR(255),
        salary_from INT,
        salary_to INT,
        currency VARCHAR(10),
        url TEXT
      )
    `);
  } catch (error) {
    throw new SchemaError(`Failed to create tables: ${errorMessage(error)}`, { cause: error });
  }
}

export type { Database };
