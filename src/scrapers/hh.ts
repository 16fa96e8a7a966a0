import type { CompanyRecord, SalaryRecord, VacancyRecord } from '../db/types';
import type { VacancySource } from './types';
import { DEFAULT_HH_API_URL, DEFAULT_USER_AGENT } from '../config';

const PER_PAGE = 100;
// hh.ru serves at most 2000 results per search
const MAX_PAGES = 20;
const DELAY_MS = 250;

export interface HeadHunterOptions {
  baseUrl?: string;
  userAgent?: string;
  perPage?: number;
  maxPages?: number;
  delayMs?: number;
}

export class HeadHunterError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(message: string, status: number, url: string) {
    super(message);
    this.name = 'HeadHunterError';
    this.status = status;
    this.url = url;
  }
}

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberOrNull(value: unknown): number | null {
  return typeof value === 'number' ? value : null;
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function toSalary(value: unknown): SalaryRecord | null {
  if (!isRecord(value)) return null;
  return {
    from: numberOrNull(value.from),
    to: numberOrNull(value.to),
    currency: stringOrNull(value.currency),
  };
}

/**
 * Keeps the item's own keys, so a field hh.ru left out stays absent and the
 * vacancy writer can skip the record.
 */
export function toVacancyRecord(item: Record<string, unknown>): VacancyRecord {
  const { id, name, alternate_url, salary, ...rest } = item;
  const record: VacancyRecord = {};
  Object.assign(record, rest);

  if (typeof id === 'string' || typeof id === 'number') record.id = id;
  if ('name' in item) record.name = stringOrNull(name);
  if ('alternate_url' in item) record.alternate_url = stringOrNull(alternate_url);
  if ('salary' in item) record.salary = toSalary(salary);

  return record;
}

export class HeadHunterAdapter implements VacancySource {
  name = 'hh';

  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly perPage: number;
  private readonly maxPages: number;
  private readonly delayMs: number;

  constructor(options: HeadHunterOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_HH_API_URL).replace(/\/+$/, '');
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.perPage = options.perPage ?? PER_PAGE;
    this.maxPages = options.maxPages ?? MAX_PAGES;
    this.delayMs = options.delayMs ?? DELAY_MS;
  }

  async fetchEmployer(employerId: string): Promise<CompanyRecord> {
    const url = `${this.baseUrl}/employers/${encodeURIComponent(employerId)}`;
    console.log(`[HH] Fetching employer ${employerId}...`);
    const data = await this.getJson(url);

    const employer: Record<string, unknown> = isRecord(data) ? data : {};
    const { id, name } = employer;
    if ((typeof id !== 'string' && typeof id !== 'number') || typeof name !== 'string') {
      throw new HeadHunterError(`Unexpected employer payload for ${employerId}`, 200, url);
    }

    return { id, name, alternate_url: stringOrNull(employer.alternate_url) };
  }

  async fetchVacancies(employerId: string): Promise<VacancyRecord[]> {
    const vacancies: VacancyRecord[] = [];

    for (let page = 0; page < this.maxPages; page++) {
      const params = new URLSearchParams({
        employer_id: employerId,
        page: String(page),
        per_page: String(this.perPage),
      });
      const url = `${this.baseUrl}/vacancies?${params.toString()}`;
      const data = await this.getJson(url);

      const items = isRecord(data) && Array.isArray(data.items) ? data.items.filter(isRecord) : [];
      if (items.length === 0) {
        console.log(`[HH] No more vacancies for employer ${employerId} on page ${page}, done.`);
        break;
      }

      vacancies.push(...items.map(toVacancyRecord));
      console.log(`[HH] Employer ${employerId} page ${page}: ${items.length} fetched, ${vacancies.length} total`);

      const pages = isRecord(data) && typeof data.pages === 'number' ? data.pages : 0;
      if (page + 1 >= pages) break;
      await delay(this.delayMs);
    }

    return vacancies;
  }

  private async getJson(url: string): Promise<unknown> {
    const response = await fetch(url, {
      headers: {
        'User-Agent': this.userAgent,
        'HH-User-Agent': this.userAgent,
        Accept: 'application/json',
      },
    });

    if (!response.ok) {
      throw new HeadHunterError(`HTTP ${response.status} from ${url}`, response.status, url);
    }

    return response.json();
  }
}
