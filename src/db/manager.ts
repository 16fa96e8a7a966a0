import { createTables, openDatabase } from './schema';
import type { Database } from './schema';
import { ReadError, WriteError, errorMessage } from './errors';
import {
  REQUIRED_VACANCY_FIELDS,
  type CompanyRecord,
  type CompanyVacancyCount,
  type DbParams,
  type Logger,
  type RequiredVacancyField,
  type SalaryRecord,
  type VacancyRecord,
  type VacancySummary,
  type VacancyWithCompany,
  type VacancyWriteResult,
} from './types';

export interface DBManagerOptions {
  logger?: Logger;
}

type CompleteVacancy = VacancyRecord & {
  id: number | string | null;
  name: string | null;
  alternate_url: string | null;
};

const DEFAULT_CURRENCY = 'RUR';

function missingFields(vacancy: VacancyRecord): RequiredVacancyField[] {
  return REQUIRED_VACANCY_FIELDS.filter(key => !(key in vacancy) || vacancy[key] === undefined);
}

function isComplete(vacancy: VacancyRecord): vacancy is CompleteVacancy {
  return missingFields(vacancy).length === 0;
}

// `id INT PRIMARY KEY` is not a rowid alias: SQLite would store NULL or text ids as-is.
function isIntegerId(id: unknown): id is number | string {
  if (typeof id === 'number') return Number.isInteger(id);
  return typeof id === 'string' && /^-?\d+$/.test(id);
}

/**
 * Owns a single SQLite connection holding the `companies` and `vacancies` tables.
 *
 * Every statement auto-commits. Vacancy inserts never throw: failures are logged and
 * reported through the returned {@link VacancyWriteResult}. Read queries throw
 * {@link ReadError}.
 */
export class DBManager {
  private readonly db: Database.Database;
  private readonly logger: Logger;

  /**
   * @throws ConnectionError if the database cannot be opened
   * @throws SchemaError if the tables cannot be created
   */
  constructor(params: DbParams, options: DBManagerOptions = {}) {
    this.logger = options.logger ?? console;
    this.db = openDatabase(params);
    try {
      createTables(this.db);
    } catch (error) {
      this.db.close();
      throw error;
    }
  }

  get open(): boolean {
    return this.db.open;
  }

  createTables(): void {
    createTables(this.db);
  }

  // --- Writers ---

  /** Inserts a company; an existing id wins and the call is a no-op. */
  insertCompany(company: CompanyRecord): { id: number | string; isNew: boolean } {
    const result = this.db.prepare<[number | string, string, string | null]>(`
      INSERT INTO companies (id, name, url)
      VALUES (?, ?, ?)
      ON CONFLICT (id) DO NOTHING
    `).run(company.id, company.name, company.alternate_url ?? null);

    return { id: company.id, isNew: result.changes > 0 };
  }

  insertVacancy(vacancy: VacancyRecord, companyId: number | string): VacancyWriteResult {
    if (!isComplete(vacancy)) {
      return { status: 'skipped', missing: missingFields(vacancy) };
    }

    const { id } = vacancy;
    if (!isIntegerId(id)) {
      return this.writeFailed(vacancy, `Invalid vacancy id: ${JSON.stringify(id)}`);
    }

    // Absent, null and zero all collapse to the same defaults.
    const salary: SalaryRecord = vacancy.salary || {};
    const salaryFrom = salary.from || 0;
    const salaryTo = salary.to || 0;
    const currency = salary.currency || DEFAULT_CURRENCY;

    try {
      const result = this.db.prepare<
        [number | string, number | string, string | null, number, number, string, string | null]
      >(`
        INSERT INTO vacancies
          (id, company_id, name, salary_from, salary_to, currency, url)
        VALUES (?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT (id) DO NOTHING
      `).run(
        id, companyId, vacancy.name, salaryFrom, salaryTo, currency, vacancy.alternate_url
      );

      return { status: result.changes > 0 ? 'inserted' : 'duplicate' };
    } catch (error) {
      return this.writeFailed(vacancy, errorMessage(error), error);
    }
  }

  private writeFailed(vacancy: CompleteVacancy, message: string, cause?: unknown): VacancyWriteResult {
    this.logger.error(`[DB] Failed to insert vacancy: ${message}`);
    this.logger.error('[DB] Offending vacancy:', vacancy);
    return {
      status: 'failed',
      error: new WriteError(`Failed to insert vacancy ${String(vacancy.id)}: ${message}`, vacancy, { cause }),
    };
  }

  // --- Readers ---

  getCompaniesAndVacanciesCount(): CompanyVacancyCount[] {
    return this.read('getCompaniesAndVacanciesCount', () =>
      this.db.prepare<[], CompanyVacancyCount>(`
        SELECT c.name AS name, COUNT(v.id) AS vacancies
        FROM companies c
        LEFT JOIN vacancies v ON c.id = v.company_id
        GROUP BY c.name
      `).all()
    );
  }

  getAllVacancies(): VacancyWithCompany[] {
    return this.read('getAllVacancies', () =>
      this.db.prepare<[], VacancyWithCompany>(`
        SELECT c.name AS company, v.name AS name, v.salary_from AS salaryFrom,
               v.salary_to AS salaryTo, v.url AS url
        FROM vacancies v
        JOIN companies c ON v.company_id = c.id
      `).all()
    );
  }

  /** Mean of the per-vacancy salary midpoints, or null when no vacancy has both bounds. */
  getAvgSalary(): number | null {
    return this.read('getAvgSalary', () => {
      const row = this.db.prepare<[], { avg: number | null }>(`
        SELECT AVG((salary_from + salary_to) / 2) AS avg
        FROM vacancies
        WHERE salary_from IS NOT NULL AND salary_to IS NOT NULL
      `).get();
      return row?.avg ?? null;
    });
  }

  getVacanciesWithHigherSalary(): VacancySummary[] {
    const avgSalary = this.getAvgSalary();
    return this.read('getVacanciesWithHigherSalary', () =>
      this.db.prepare<[number | null], VacancySummary>(`
        SELECT name, salary_from AS salaryFrom, salary_to AS salaryTo, url
        FROM vacancies
        WHERE ((salary_from + salary_to) / 2) > ?
      `).all(avgSalary)
    );
  }

  getVacanciesWithKeyword(keyword: string): VacancySummary[] {
    return this.read('getVacanciesWithKeyword', () =>
      this.db.prepare<[string], VacancySummary>(`
        SELECT name, salary_from AS salaryFrom, salary_to AS salaryTo, url
        FROM vacancies
        WHERE casefold(name) LIKE casefold(?)
      `).all(`%${keyword}%`)
    );
  }

  close(): void {
    this.db.close();
  }

  private read<T>(query: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof ReadError) throw error;
      throw new ReadError(query, { cause: error });
    }
  }
}
