import dotenv from 'dotenv';
dotenv.config();

import { createApp } from './app';
import { ensureDatabaseDir, loadDbParams } from './config';
import { DBManager } from './db/manager';

const PORT = Number(process.env.PORT) || 3001;

const params = loadDbParams();
ensureDatabaseDir(params);
const manager = new DBManager(params);

const server = createApp(manager).listen(PORT, () => {
  console.log(`[Server] Vacancy API running on http://localhost:${PORT} (database: ${params.database})`);
});

function shutdown(signal: string) {
  console.log(`[Server] ${signal} received, closing...`);
  server.close(() => {
    manager.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
