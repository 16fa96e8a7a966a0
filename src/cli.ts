#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();

import { ensureDatabaseDir, loadDbParams, loadImportConfig } from './config';
import { DBManager } from './db/manager';
import { HeadHunterAdapter } from './scrapers/hh';
import { importEmployers } from './scrapers/runner';

const [command, ...args] = process.argv.slice(2);

const USAGE = `
Usage:
  tsx src/cli.ts init                 Create the companies and vacancies tables
  tsx src/cli.ts import [ids...]      Import employers and their vacancies from hh.ru (default: HH_EMPLOYER_IDS)
  tsx src/cli.ts companies            Companies with their vacancy counts
  tsx src/cli.ts vacancies            All vacancies with company names
  tsx src/cli.ts avg                  Average salary midpoint
  tsx src/cli.ts top                  Vacancies paying above the average
  tsx src/cli.ts search <keyword>     Vacancies whose name contains the keyword
`;

async function run(manager: DBManager): Promise<void> {
  switch (command) {
    case 'init': {
      console.log('\nTables are ready.');
      break;
    }

    case 'import': {
      const config = loadImportConfig();
      const employerIds = args.length > 0 ? args : config.employerIds;
      const adapter = new HeadHunterAdapter({ baseUrl: config.baseUrl, userAgent: config.userAgent });
      const results = await importEmployers(manager, adapter, employerIds);
      console.log('\nResults:', JSON.stringify(results, null, 2));
      break;
    }

    case 'companies': {
      console.table(manager.getCompaniesAndVacanciesCount());
      break;
    }

    case 'vacancies': {
      console.table(manager.getAllVacancies());
      break;
    }

    case 'avg': {
      const avg = manager.getAvgSalary();
      console.log(avg === null ? '\nNo vacancies with salary data.' : `\nAverage salary: ${Math.round(avg)}`);
      break;
    }

    case 'top': {
      console.table(manager.getVacanciesWithHigherSalary());
      break;
    }

    case 'search': {
      const keyword = args.join(' ').trim();
      if (!keyword) {
        console.log(USAGE);
        process.exitCode = 1;
        break;
      }
      console.table(manager.getVacanciesWithKeyword(keyword));
      break;
    }

    default:
      console.log(USAGE);
  }
}

async function main() {
  const params = loadDbParams();
  ensureDatabaseDir(params);
  const manager = new DBManager(params);
  try {
    await run(manager);
  } finally {
    manager.close();
  }
}

main().catch(err => {
  console.error('Error:', err);
  process.exit(1);
});
