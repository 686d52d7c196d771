/**
 * Runs before every test file (vitest setupFiles).
 * Tests never reach Postgres: the app is built on the in-memory store.
 */
process.env.NODE_ENV = 'test';
process.env.STORE_DRIVER = 'memory';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
