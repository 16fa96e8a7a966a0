import type { CompanyRecord, VacancyRecord } from '../db/types';

/** Upstream feed of employers and their vacancies. */
export interface VacancySource {
  name: string;
  fetchEmployer(employerId: string): Promise<CompanyRecord>;
  fetchVacancies(employerId: string): Promise<VacancyRecord[]>;
}

export interface ImportResult {
  company: string | null;
  found: number;
  inserted: number;
  duplicates: number;
  skipped: number;
  failed: number;
}
