import { loadConfig } from './config.js';
import { createContext } from './context.js';
import { createApp } from './app.js';
import { openDatabase } from './store/db.js';
import { importLegacyFile } from './store/legacy-import.js';

const config = loadConfig();

// Open the SQLite database and create tables before setting up the app
const db = openDatabase(config.dbPath);
const ctx = createContext(config, db);

if (config.legacyDbFile) {
  importLegacyFile(ctx.users, config.legacyDbFile);
}

const { app, closeSessions } = createApp(ctx);

const server = app.listen(config.port, () => {
  console.warn(`Calorie log server listening on port ${config.port}`);
  console.warn(`Auto-login: ${config.autoLoginEnabled ? 'enabled' : 'disabled'}`);
  console.warn(`Health check: http://localhost:${config.port}/health`);
  console.warn(`MCP endpoint: http://localhost:${config.port}/mcp`);
});

/** Graceful shutdown: close all MCP sessions and the database, then exit. */
async function shutdown(): Promise<void> {
  console.warn('\nShutting down...');

  await closeSessions();

  server.close(() => {
    db.close();
    console.warn('Server closed.');
    process.exit(0);
  });
}

process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());
