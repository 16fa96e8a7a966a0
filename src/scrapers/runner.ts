import type { DBManager } from '../db/manager';
import type { Logger, VacancyRecord } from '../db/types';
import { errorMessage } from '../db/errors';
import type { ImportResult, VacancySource } from './types';

export interface ImportOptions {
  logger?: Logger;
}

function emptyResult(): ImportResult {
  return { company: null, found: 0, inserted: 0, duplicates: 0, skipped: 0, failed: 0 };
}

/** Stores one employer as a company, then every vacancy it has open. */
export async function importEmployer(
  manager: DBManager,
  source: VacancySource,
  employerId: string,
  options: ImportOptions = {}
): Promise<ImportResult> {
  const logger = options.logger ?? console;
  const result = emptyResult();

  logger.log(`[Runner] Importing employer ${employerId} from ${source.name}...`);
  const company = await source.fetchEmployer(employerId);
  const { isNew } = manager.insertCompany(company);
  result.company = company.name;

  let vacancies: VacancyRecord[];
  try {
    vacancies = await source.fetchVacancies(employerId);
  } catch (error) {
    logger.error(`[Runner] ${company.name} stored, but its vacancies could not be fetched: ${errorMessage(error)}`);
    return result;
  }
  result.found = vacancies.length;

  for (const vacancy of vacancies) {
    const write = manager.insertVacancy(vacancy, company.id);
    switch (write.status) {
      case 'inserted':
        result.inserted++;
        break;
      case 'duplicate':
        result.duplicates++;
        break;
      case 'skipped':
        result.skipped++;
        break;
      case 'failed':
        result.failed++;
        break;
    }
  }

  logger.log(
    `[Runner] ${company.name}${isNew ? '' : ' (existing)'}: ${result.found} found, ${result.inserted} new ` +
      `(${result.duplicates} duplicates, ${result.skipped} skipped, ${result.failed} failed)`
  );
  return result;
}

export async function importEmployers(
  manager: DBManager,
  source: VacancySource,
  employerIds: string[],
  options: ImportOptions = {}
): Promise<Record<string, ImportResult>> {
  const logger = options.logger ?? console;
  const results: Record<string, ImportResult> = {};

  for (const employerId of employerIds) {
    try {
      results[employerId] = await importEmployer(manager, source, employerId, options);
    } catch (error) {
      logger.error(`[Runner] Skipping employer ${employerId}: ${errorMessage(error)}`);
      results[employerId] = emptyResult();
    }
  }

  return results;
}
