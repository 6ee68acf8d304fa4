// Global test setup - runs before all tests
// Keeps pino quiet unless a test opts in
if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'silent';
}
