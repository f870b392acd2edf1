/**
 * Enrollment Roster Scraper
 * Fetches the registered-students feed for one degree program
 */

import type { ScraperConfig } from '../config.js';
import { ajaxHeaders, getFreshCsrf, httpGetJson, portalUrls, type PortalSession } from '../httpAuth.js';
import { logger } from '../logger.js';
import { extractStudentInfo, parseRosterResponse } from '../parsers/enrollmentParser.js';
import type { StudentInfo } from '../types.js';
import { withRetry } from '../utils/retry.js';

export function enrollmentQuery(config: ScraperConfig, programId: string, now: number = Date.now()): URLSearchParams {
  return new URLSearchParams({
    event: 'registered',
    level: '-1',
    term: config.termId,
    campus: config.campusId,
    progid: programId,
    validation_status: '0',
    section: '',
    draw: '1',
    start: '0',
    length: '-1',   // -1 = every row
    _: String(now), // cache buster
  });
}

export async function fetchEnrollment(
  session: PortalSession,
  config: ScraperConfig,
  programId: string
): Promise<StudentInfo[]> {
  const url = `${portalUrls(session.baseUrl).ENROLLMENT}?${enrollmentQuery(config, programId)}`;

  const body = await withRetry(
    async () => {
      const csrf = await getFreshCsrf(session);
      return httpGetJson(url, session, ajaxHeaders(csrf));
    },
    { retries: config.maxRetries, delayMs: config.retryDelayMs, label: `roster ${programId}` }
  );

  const rows = parseRosterResponse(body);
  logger.info('Enrollment', `Fetched ${rows.length} students for progid ${programId}`);
  return rows.map(extractStudentInfo);
}
