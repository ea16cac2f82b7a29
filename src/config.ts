/**
 * Configuration - Validation thresholds and config file loading
 */

import * as fs from 'fs';
import { z } from 'zod';
import { ValidationThresholds } from './types';

export const DEFAULT_THRESHOLDS: Readonly<ValidationThresholds> = Object.freeze({
  allocationEpsilon: 0.01,
  conservativeMaxExposure: 30,
  moderateMinExposure: 20,
  moderateMaxExposure: 70,
  aggressiveMinExposure: 50,
  maxVolatilityLimit: 50,
  maxManagementFeeLimit: 5
});

const percent = z.number().min(0).max(100);

const ThresholdsSchema = z.object({
  allocationEpsilon: z.number().nonnegative().describe('Allowed deviation of the allocation total from 100%'),
  conservativeMaxExposure: percent.describe('Highest high-risk exposure for a conservative profile'),
  moderateMinExposure: percent,
  moderateMaxExposure: percent,
  aggressiveMinExposure: percent.describe('Lowest high-risk exposure for an aggressive profile'),
  maxVolatilityLimit: percent,
  maxManagementFeeLimit: percent
}).partial().strict();

const ConfigFileSchema = z.object({
  thresholds: ThresholdsSchema.optional()
}).strict();

export type ThresholdOverrides = z.infer<typeof ThresholdsSchema>;

/**
 * Merge overrides onto the defaults, rejecting an inverted moderate range
 */
export function resolveThresholds(overrides: ThresholdOverrides = {}): ValidationThresholds {
  const thresholds: ValidationThresholds = { ...DEFAULT_THRESHOLDS, ...overrides };

  if (thresholds.moderateMinExposure > thresholds.moderateMaxExposure) {
    throw new Error(
      `moderateMinExposure (${thresholds.moderateMinExposure}) is greater than moderateMaxExposure (${thresholds.moderateMaxExposure})`
    );
  }

  return thresholds;
}

/**
 * Load thresholds from a JSON config file of the form `{ "thresholds": { ... } }`
 */
export function loadThresholds(configPath: string): ValidationThresholds {
  if (!fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new Error(`Cannot parse config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config file ${configPath}: ${details}`);
  }

  return resolveThresholds(parsed.data.thresholds);
}
