// Global Jest setup, runs before every test file.
// NODE_ENV=test turns off the rate limiter in buildApp.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.CARD_FETCH_DELAY_MS = '0';
