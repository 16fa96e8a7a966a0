import type { WriteError } from './errors';

export interface DbParams {
  /** File path, or ':memory:' for a throwaway database. */
  database: string;
  readonly?: boolean;
  fileMustExist?: boolean;
  /** Busy timeout in milliseconds. */
  timeout?: number;
}

export type Logger = Pick<Console, 'log' | 'error'>;

// --- Upstream records (HeadHunter API shape, fields not guaranteed) ---

export interface CompanyRecord {
  id: number | string;
  name: string;
  alternate_url: string | null;
}

export interface SalaryRecord {
  from?: number | null;
  to?: number | null;
  currency?: string | null;
}

export interface VacancyRecord {
  id?: number | string | null;
  name?: string | null;
  alternate_url?: string | null;
  salary?: SalaryRecord | null;
  [key: string]: unknown;
}

export const REQUIRED_VACANCY_FIELDS = ['id', 'name', 'alternate_url'] as const;

export type RequiredVacancyField = (typeof REQUIRED_VACANCY_FIELDS)[number];

// --- Write results ---

export type VacancyWriteResult =
  | { status: 'inserted' }
  | { status: 'duplicate' }
  | { status: 'skipped'; missing: RequiredVacancyField[] }
  | { status: 'failed'; error: WriteError };

// --- Read rows ---

export interface CompanyVacancyCount {
  name: string;
  vacancies: number;
}

export interface VacancyWithCompany {
  company: string;
  name: string | null;
  salaryFrom: number | null;
  salaryTo: number | null;
  url: string | null;
}

export interface VacancySummary {
  name: string | null;
  salaryFrom: number | null;
  salaryTo: number | null;
  url: string | null;
}
