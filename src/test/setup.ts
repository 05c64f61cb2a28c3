/**
 * Test setup file
 * Sets up environment variables for tests
 */

// Set test environment variables before importing any modules
process.env.NODE_ENV = 'test';
process.env.ADMIN_API_KEY = 'test-api-key-12345';
process.env.LOG_LEVEL = 'error'; // Minimize logging during tests
process.env.DISCORD_BOT_TOKEN = 'test-discord-bot-token';
process.env.TEMP_DIR = 'Temp_Export_Test';
process.env.LOCAL_BACKUP_DIR = 'Local_Backup_Test';
