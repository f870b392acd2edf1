/**
 * Scraper configuration
 *
 * Built once from the environment (after dotenv has loaded .env) and passed
 * explicitly to everything that talks to the portal.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import type { Department } from './types.js';

export interface PortalCredentials {
  username: string;
  password: string;
}

export interface ScraperConfig {
  baseUrl: string;
  credentials: PortalCredentials | null;
  debug: boolean;
  requestDelayMs: number;
  maxRetries: number;
  retryDelayMs: number;
  maxWorkers: number;
  termId: string;
  campusId: string;
  progClass: string;
  outputDir: string;
  databasePath: string | null;
  departmentsFile: string;
}

type Env = Record<string, string | undefined>;

function intOr(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

export function loadConfig(env: Env = process.env): ScraperConfig {
  const username = env.PORTAL_USERNAME?.trim();
  const password = env.PORTAL_PASSWORD;

  return {
    baseUrl: (env.PORTAL_BASE_URL || 'https://prisms.ustp.edu.ph').replace(/\/+$/, ''),
    credentials: username && password ? { username, password } : null,
    debug: (env.DEBUG_MODE || 'false').toLowerCase() === 'true',
    requestDelayMs: intOr(env.DELAY_BETWEEN_REQUESTS, 500),
    maxRetries: Math.max(1, intOr(env.MAX_RETRIES, 3)),
    retryDelayMs: intOr(env.RETRY_DELAY_MS, 2000),
    maxWorkers: Math.max(1, intOr(env.MAX_WORKERS, 5)),
    termId: env.TERM_ID || '187',
    campusId: env.CAMPUS_ID || '1',
    progClass: env.PROG_CLASS || '50',
    outputDir: env.OUTPUT_DIR || 'scraped_data',
    databasePath: env.DATABASE_PATH || null,
    departmentsFile: env.DEPARTMENTS_FILE || 'config/departments.json',
  };
}

export function requireCredentials(config: ScraperConfig): PortalCredentials {
  if (!config.credentials) {
    throw new ConfigError('Missing portal credentials. Set PORTAL_USERNAME and PORTAL_PASSWORD in .env');
  }
  return config.credentials;
}

const DepartmentListSchema = z
  .array(
    z.object({
      name: z.string().min(1),
      folder: z.string().min(1).regex(/^[\w.-]+$/, 'folder must be a plain directory name'),
      programId: z.string().min(1),
    })
  )
  .min(1);

export function parseDepartments(value: unknown, source = 'departments'): Department[] {
  const result = DepartmentListSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')} ` : '';
    throw new ConfigError(`Invalid ${source}: ${where}${issue.message}`);
  }
  return result.data;
}

export function loadDepartments(filePath: string): Department[] {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read department list ${filePath}: ${errorMessage(err)}`);
  }

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Department list ${filePath} is not valid JSON`);
  }
  return parseDepartments(value, filePath);
}
