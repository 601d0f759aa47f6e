// Keep test output clean; individual tests inject their own loggers when they assert on logging.
process.env.LOG_LEVEL = 'silent';

export {};
