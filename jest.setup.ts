// Jest setup file for test configuration
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.OUTPOST_CLIENT_TYPE = process.env.OUTPOST_CLIENT_TYPE || 'mock';

// Set test timeout
jest.setTimeout(10000);
