import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DBManager } from '../db/manager';
import type { CompanyRecord, Logger, VacancyRecord } from '../db/types';
import { importEmployers } from './runner';
import type { VacancySource } from './types';

class FakeSource implements VacancySource {
  name = 'fake';

  constructor(
    private readonly employers: Record<string, CompanyRecord>,
    private readonly vacancies: Record<string, VacancyRecord[]>
  ) {}

  async fetchEmployer(employerId: string): Promise<CompanyRecord> {
    const employer = this.employers[employerId];
    if (!employer) throw new Error(`HTTP 404 for employer ${employerId}`);
    return employer;
  }

  async fetchVacancies(employerId: string): Promise<VacancyRecord[]> {
    return this.vacancies[employerId] ?? [];
  }
}

describe('importEmployers', () => {
  let logger: Logger;
  let manager: DBManager;

  beforeEach(() => {
    logger = { log: vi.fn(), error: vi.fn() };
    manager = new DBManager({ database: ':memory:' }, { logger });
  });

  afterEach(() => {
    manager.close();
  });

  it('stores each employer and counts what happened to its vacancies', async () => {
    const source = new FakeSource(
      { '1': { id: '1', name: 'Acme', alternate_url: 'http://acme' } },
      {
        '1': [
          { id: '10', name: 'Engineer', alternate_url: 'http://acme/10', salary: { from: 1000, to: 2000, currency: 'USD' } },
          { id: '10', name: 'Engineer again', alternate_url: 'http://acme/10' },
          { id: '11', name: 'No link' },
          { id: '12', name: 'Designer', alternate_url: 'http://acme/12', salary: null },
        ],
      }
    );

    const results = await importEmployers(manager, source, ['1'], { logger });

    expect(results).toEqual({
      '1': { company: 'Acme', found: 4, inserted: 2, duplicates: 1, skipped: 1, failed: 0 },
    });
    expect(manager.getCompaniesAndVacanciesCount()).toEqual([{ name: 'Acme', vacancies: 2 }]);
    expect(manager.getAllVacancies()).toEqual([
      { company: 'Acme', name: 'Engineer', salaryFrom: 1000, salaryTo: 2000, url: 'http://acme/10' },
      { company: 'Acme', name: 'Designer', salaryFrom: 0, salaryTo: 0, url: 'http://acme/12' },
    ]);
    expect(logger.log).toHaveBeenLastCalledWith(
      '[Runner] Acme: 4 found, 2 new (1 duplicates, 1 skipped, 0 failed)'
    );
  });

  it('moves on when an employer cannot be fetched', async () => {
    const source = new FakeSource(
      { '2': { id: '2', name: 'Globex', alternate_url: null } },
      { '2': [{ id: '20', name: 'Analyst', alternate_url: 'http://globex/20' }] }
    );

    const results = await importEmployers(manager, source, ['404', '2'], { logger });

    expect(results['404']).toEqual({ company: null, found: 0, inserted: 0, duplicates: 0, skipped: 0, failed: 0 });
    expect(results['2']).toEqual({ company: 'Globex', found: 1, inserted: 1, duplicates: 0, skipped: 0, failed: 0 });
    expect(logger.error).toHaveBeenCalledWith('[Runner] Skipping employer 404: HTTP 404 for employer 404');
  });

  it('marks an employer that was already imported', async () => {
    const source = new FakeSource({ '1': { id: '1', name: 'Acme', alternate_url: null } }, {});

    await importEmployers(manager, source, ['1'], { logger });
    await importEmployers(manager, source, ['1'], { logger });

    expect(logger.log).toHaveBeenLastCalledWith(
      '[Runner] Acme (existing): 0 found, 0 new (0 duplicates, 0 skipped, 0 failed)'
    );
  });

  it('keeps the stored company when its vacancies cannot be fetched', async () => {
    const source = new FakeSource({ '1': { id: '1', name: 'Acme', alternate_url: null } }, {});
    source.fetchVacancies = async () => {
      throw new Error('HTTP 503 from http://hh.test/vacancies');
    };

    const results = await importEmployers(manager, source, ['1'], { logger });

    expect(results['1']).toEqual({ company: 'Acme', found: 0, inserted: 0, duplicates: 0, skipped: 0, failed: 0 });
    expect(manager.getCompaniesAndVacanciesCount()).toEqual([{ name: 'Acme', vacancies: 0 }]);
    expect(logger.error).toHaveBeenCalledWith(
      '[Runner] Acme stored, but its vacancies could not be fetched: HTTP 503 from http://hh.test/vacancies'
    );
  });
});
