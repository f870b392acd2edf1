/**
 * Transcript Scraper
 * Loads one student's grade history via the registrar's XHR endpoint
 */

import type { ScraperConfig } from '../config.js';
import { ajaxHeaders, getFreshCsrf, httpPostJson, portalUrls, type PortalSession } from '../httpAuth.js';
import { logger } from '../logger.js';
import { parseTranscriptHTML } from '../parsers/transcriptParser.js';
import type { SubjectRecord } from '../types.js';
import { withRetry } from '../utils/retry.js';

interface TranscriptResponse {
  error?: unknown;
  message?: unknown;
  content?: unknown;
}

function asTranscriptResponse(body: unknown): TranscriptResponse {
  return typeof body === 'object' && body !== null && !Array.isArray(body) ? body : {};
}

/**
 * Subjects from a decoded transcript response. A portal-side error or an
 * empty content block means no subjects, not a failure.
 */
export function subjectsFromResponse(body: unknown, studentId: string = 'Unknown'): SubjectRecord[] {
  const response = asTranscriptResponse(body);
  if (response.error) {
    logger.warn('Transcript', `Server error for ${studentId}: ${String(response.message ?? 'Unknown')}`);
    return [];
  }
  const content = typeof response.content === 'string' ? response.content : '';
  if (content.trim() === '') return [];
  return parseTranscriptHTML(content);
}

export async function fetchTranscript(
  session: PortalSession,
  config: ScraperConfig,
  encodedId: string,
  studentId: string = encodedId
): Promise<SubjectRecord[]> {
  const url = portalUrls(session.baseUrl).TRANSCRIPT;

  const body = await withRetry(
    async () => {
      const csrf = await getFreshCsrf(session);
      return httpPostJson(
        url,
        session,
        { _token: csrf, event: 'load-grades', progClass: config.progClass, idno: encodedId },
        ajaxHeaders(csrf)
      );
    },
    { retries: config.maxRetries, delayMs: config.retryDelayMs, label: studentId }
  );

  return subjectsFromResponse(body, studentId);
}
