/**
 * Jest Test Setup
 * Global test configuration and setup
 */

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.VERBOSE = 'false';
delete process.env.USER_AGENT;
delete process.env.MAX_PAGES;

// Suppress crawl progress output during tests (uncomment when debugging)
// global.console = {
//   ...console,
//   log: jest.fn(),
//   debug: jest.fn(),
// };
