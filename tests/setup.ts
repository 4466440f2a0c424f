/**
 * Runs before each test file. DATABASE_PATH is :memory: (vitest.config.ts),
 * so every file gets its own empty schema.
 */
import { initializeDatabase } from '../src/config/database';

initializeDatabase();
