/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 * LOG_LEVEL is read by the logger directly.
 */

import { logger } from './logger';
import {
  FAST_TRACK_THRESHOLD,
  FRAUD_KEYWORDS,
  DEFAULT_DOCUMENTS_DIR,
  DEFAULT_OUTPUT_DIR,
} from './constants';

export interface Config {
  // Routing policy
  fastTrackThreshold: number;
  fraudKeywords: string[];

  // CLI paths
  documentsDir: string;
  outputDir: string;
}

type Env = Record<string, string | undefined>;

function parseThreshold(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return FAST_TRACK_THRESHOLD;

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    logger.warn('Invalid FAST_TRACK_THRESHOLD, using default', {
      value: raw,
      default: FAST_TRACK_THRESHOLD,
    });
    return FAST_TRACK_THRESHOLD;
  }
  return value;
}

function parseKeywordList(raw: string | undefined): string[] {
  if (raw === undefined) return [...FRAUD_KEYWORDS];

  const keywords = raw
    .split(',')
    .map((k) => k.trim().toLowerCase())
    .filter((k) => k.length > 0);

  if (keywords.length === 0) {
    logger.warn('FRAUD_KEYWORDS is empty, using default keyword list');
    return [...FRAUD_KEYWORDS];
  }
  return keywords;
}

/**
 * Build a config from an environment map. Exposed for tests.
 */
export function loadConfig(env: Env): Config {
  return {
    // Routing policy
    fastTrackThreshold: parseThreshold(env.FAST_TRACK_THRESHOLD),
    fraudKeywords: parseKeywordList(env.FRAUD_KEYWORDS),

    // CLI paths
    documentsDir: env.CLAIM_DOCUMENTS_DIR || DEFAULT_DOCUMENTS_DIR,
    outputDir: env.CLAIM_OUTPUT_DIR || DEFAULT_OUTPUT_DIR,
  };
}

export const config: Config = loadConfig(process.env);
