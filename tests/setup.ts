/**
 * Test setup and configuration
 */

// Keep config loading independent of the developer's environment
process.env['NODE_ENV'] = 'test';
process.env['LOG_LEVEL'] = 'error';
process.env['DRY_RUN'] = 'true';
process.env['FOLLOWERS_CONFIG_PATH'] = './tests/fixtures/does-not-exist.json';
delete process.env['DATABASE_URL'];
delete process.env['MONITOR_WALLETS'];
