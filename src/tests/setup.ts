// Runs before each test file is loaded
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
