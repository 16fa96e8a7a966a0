import { describe, expect, it } from 'vitest';
import { DEFAULT_DB_PATH, DEFAULT_EMPLOYER_IDS, loadDbParams, loadImportConfig } from './config';

describe('loadDbParams', () => {
  it('falls back to the bundled database path', () => {
    expect(loadDbParams({})).toEqual({ database: DEFAULT_DB_PATH });
  });

  it('reads the database options', () => {
    expect(
      loadDbParams({
        DB_PATH: '/var/lib/vacancies.db',
        DB_READONLY: 'true',
        DB_FILE_MUST_EXIST: '0',
        DB_TIMEOUT: '2500',
      })
    ).toEqual({
      database: '/var/lib/vacancies.db',
      readonly: true,
      fileMustExist: false,
      timeout: 2500,
    });
  });

  it('rejects malformed values', () => {
    expect(() => loadDbParams({ DB_READONLY: 'maybe' })).toThrow(
      'Invalid DB_READONLY: expected true or false, got "maybe"'
    );
    expect(() => loadDbParams({ DB_TIMEOUT: '-1' })).toThrow(
      'Invalid DB_TIMEOUT: expected a non-negative integer, got "-1"'
    );
  });
});

describe('loadImportConfig', () => {
  it('uses the defaults when nothing is set', () => {
    const config = loadImportConfig({});

    expect(config.baseUrl).toBe('https://api.hh.ru');
    expect(config.employerIds).toEqual(DEFAULT_EMPLOYER_IDS);
  });

  it('splits the employer list', () => {
    const config = loadImportConfig({
      HH_API_URL: 'http://localhost:9000',
      HH_USER_AGENT: 'test-agent',
      HH_EMPLOYER_IDS: ' 1740, 3529 ,,',
    });

    expect(config).toEqual({
      baseUrl: 'http://localhost:9000',
      userAgent: 'test-agent',
      employerIds: ['1740', '3529'],
    });
  });
});
