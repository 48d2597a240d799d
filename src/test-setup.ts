/**
 * Test setup file - runs before every test file
 * Sets up environment variables needed for testing
 */

process.env.JWT_SECRET = 'test-secret';

// Use an in-memory database
process.env.DB_PATH = ':memory:';

// Keep expected 4xx/5xx noise out of the test output
process.env.LOG_LEVEL = 'error';

process.env.NODE_ENV = 'test';
