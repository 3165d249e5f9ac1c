/**
 * Jest setup file.
 * Tests run offline: no Redis, and logs stay quiet unless LOG_LEVEL asks otherwise.
 */

delete process.env.REDIS_URL;
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';

export {};
