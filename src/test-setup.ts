// Test setup - runs before each test file
// Pin the catalog language for deterministic messages
process.env.VALIDATION_LANGUAGE = 'en';
delete process.env.VALIDATION_MESSAGES_PATH;
delete process.env.VALIDATION_DEBUG;
