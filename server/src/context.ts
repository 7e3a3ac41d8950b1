import type Database from 'better-sqlite3';
import type { AppConfig } from './config.js';
import { SessionStore } from './auth/sessions.js';
import { loadCatalog, type FoodCatalog } from './resolver/catalog.js';
import { FoodResolver } from './resolver/resolve.js';
import { UserStore } from './store/user-store.js';

/** Everything request handlers need, built once per process and passed down. */
export interface AppContext {
  config: AppConfig;
  db: Database.Database;
  users: UserStore;
  sessions: SessionStore;
  resolver: FoodResolver;
}

export function createContext(
  config: AppConfig,
  db: Database.Database,
  catalog: FoodCatalog = loadCatalog(),
): AppContext {
  return {
    config,
    db,
    users: new UserStore(db),
    sessions: new SessionStore(db, {
      session: config.sessionTtlSeconds,
      remember: config.rememberTtlSeconds,
    }),
    resolver: new FoodResolver(catalog),
  };
}
