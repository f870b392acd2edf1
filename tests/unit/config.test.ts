import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { loadConfig, loadDepartments, parseDepartments, requireCredentials } from '../../src/config.js';
import { ConfigError } from '../../src/errors.js';

const departmentsFile = fileURLToPath(new URL('../../config/departments.json', import.meta.url));

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      baseUrl: 'https://prisms.ustp.edu.ph',
      credentials: null,
      debug: false,
      requestDelayMs: 500,
      maxRetries: 3,
      retryDelayMs: 2000,
      maxWorkers: 5,
      termId: '187',
      campusId: '1',
      progClass: '50',
      outputDir: 'scraped_data',
      databasePath: null,
      departmentsFile: 'config/departments.json',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORTAL_BASE_URL: 'https://portal.test/',
      PORTAL_USERNAME: ' test-user ',
      PORTAL_PASSWORD: 'test-secret',
      DEBUG_MODE: 'TRUE',
      MAX_WORKERS: '8',
      DATABASE_PATH: 'grades.db',
    });
    expect(config.baseUrl).toBe('https://portal.test');
    expect(config.credentials).toEqual({ username: 'test-user', password: 'test-secret' });
    expect(config.debug).toBe(true);
    expect(config.maxWorkers).toBe(8);
    expect(config.databasePath).toBe('grades.db');
  });

  it('ignores invalid numbers and keeps at least one worker and attempt', () => {
    const config = loadConfig({ DELAY_BETWEEN_REQUESTS: 'soon', RETRY_DELAY_MS: '-5', MAX_WORKERS: '0', MAX_RETRIES: '0' });
    expect(config.requestDelayMs).toBe(500);
    expect(config.retryDelayMs).toBe(2000);
    expect(config.maxWorkers).toBe(1);
    expect(config.maxRetries).toBe(1);
  });
});

describe('requireCredentials', () => {
  it('throws when credentials are missing', () => {
    expect(() => requireCredentials(loadConfig({ PORTAL_USERNAME: 'test-user' }))).toThrow(ConfigError);
  });
});

describe('departments', () => {
  it('loads the bundled department list', () => {
    const departments = loadDepartments(departmentsFile);
    expect(departments).toHaveLength(7);
    expect(departments[0].name).toBe('Civil Engineering');
    expect(departments[0].folder).toBe('Civil_Engineering');
  });

  it('rejects an empty list', () => {
    expect(() => parseDepartments([])).toThrow('Invalid departments: Array must contain at least 1 element(s)');
  });

  it('rejects folders that are not plain names', () => {
    expect(() => parseDepartments([{ name: 'Civil', folder: '../civil', programId: 'p1' }])).toThrow(
      'Invalid departments: 0.folder folder must be a plain directory name'
    );
  });

  it('reports a missing file as a config error', () => {
    expect(() => loadDepartments('/nonexistent/departments.json')).toThrow(ConfigError);
  });
});
