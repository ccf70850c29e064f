// Skip server bootstrap during Vitest runs and keep test output free of log noise.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
