import fs from 'fs';
import path from 'path';
import type { DbParams } from './db/types';

export const DEFAULT_DB_PATH = path.join(__dirname, '../data/vacancies.db');
export const DEFAULT_HH_API_URL = 'https://api.hh.ru';
export const DEFAULT_USER_AGENT = 'vacancy-store/1.0 (admin@example.com)';

// Large Russian IT employers on hh.ru
export const DEFAULT_EMPLOYER_IDS = [
  '1740', // Yandex
  '3529', // Sber
  '78638', // T-Bank
  '15478', // VK
  '2180', // Ozon
  '84585', // Avito
  '1057', // Kaspersky Lab
  '64174', // 2GIS
  '3776', // MTS
  '87021', // Wildberries
];

type Env = Record<string, string | undefined>;

function parseBoolean(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  throw new Error(`Invalid ${name}: expected true or false, got "${value}"`);
}

function parseInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid ${name}: expected a non-negative integer, got "${value}"`);
  }
  return parsed;
}

export function loadDbParams(env: Env = process.env): DbParams {
  const params: DbParams = { database: env.DB_PATH || DEFAULT_DB_PATH };

  const readonly = parseBoolean('DB_READONLY', env.DB_READONLY);
  if (readonly !== undefined) params.readonly = readonly;

  const fileMustExist = parseBoolean('DB_FILE_MUST_EXIST', env.DB_FILE_MUST_EXIST);
  if (fileMustExist !== undefined) params.fileMustExist = fileMustExist;

  const timeout = parseInteger('DB_TIMEOUT', env.DB_TIMEOUT);
  if (timeout !== undefined) params.timeout = timeout;

  return params;
}

export interface ImportConfig {
  baseUrl: string;
  userAgent: string;
  employerIds: string[];
}

export function loadImportConfig(env: Env = process.env): ImportConfig {
  const employerIds = (env.HH_EMPLOYER_IDS ?? '')
    .split(',')
    .map(id => id.trim())
    .filter(Boolean);

  return {
    baseUrl: env.HH_API_URL || DEFAULT_HH_API_URL,
    userAgent: env.HH_USER_AGENT || DEFAULT_USER_AGENT,
    employerIds: employerIds.length > 0 ? employerIds : DEFAULT_EMPLOYER_IDS,
  };
}

/** Creates the directory holding a file database, so the first run can open it. */
export function ensureDatabaseDir(params: DbParams): void {
  if (params.database === ':memory:' || params.fileMustExist) return;
  const dir = path.dirname(path.resolve(params.database));
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}
