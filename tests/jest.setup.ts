// tests/jest.setup.ts
import "@jest/globals";

// Set up environment variables for testing
process.env.NODE_ENV = "test";
process.env.MAX_MAPPING_SESSIONS = "50";

// Reset mocks before each test
beforeEach(() => {
  jest.clearAllMocks();
});

// Silence console output during tests
global.console = {
  ...console,
  log: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
};

// Handle unhandled promise rejections
process.on("unhandledRejection", (error) => {
  console.error("Unhandled promise rejection in tests:", error);
});
