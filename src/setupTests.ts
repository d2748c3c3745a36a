/**
 * Global test setup for Vitest
 */

// Mock the logger to prevent console output during tests
vi.mock('./util/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

// Mock cli-progress to prevent progress bar output during tests
vi.mock('cli-progress', () => {
  class MockSingleBar {
    start = vi.fn();
    update = vi.fn();
    setTotal = vi.fn();
    stop = vi.fn();
    increment = vi.fn();
  }

  return {
    SingleBar: MockSingleBar,
    MultiBar: class MockMultiBar {
      create = vi.fn(() => new MockSingleBar());
      stop = vi.fn();
      remove = vi.fn();
    },
    Presets: {
      shades_classic: {},
      shades_grey: {},
      rect: {},
    },
  };
});

// Placeholder key so nothing reads a real one from the environment
process.env.OPENAI_API_KEY = 'test-secret';

// Clean up after each test file
afterEach(() => {
  vi.clearAllMocks();
});
