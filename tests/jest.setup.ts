// Global Jest setup for unit tests
// Silence the logger and keep credentials from a local .env out of the tests:
// dotenv never overrides a variable that is already set.
process.env.LOG_LEVEL = 'silent';
for (const key of ['AGENTREG_API_URL', 'AGENTREG_EMAIL', 'AGENTREG_API_KEY', 'AGENTREG_PASSWORD']) {
  process.env[key] = '';
}
