/**
 * Unit tests for threshold configuration
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_THRESHOLDS, loadThresholds, resolveThresholds } from '../../src/config';

describe('resolveThresholds', () => {
  it('should return the defaults without overrides', () => {
    expect(resolveThresholds()).toEqual(DEFAULT_THRESHOLDS);
  });

  it('should merge overrides onto the defaults', () => {
    const thresholds = resolveThresholds({ maxManagementFeeLimit: 2 });

    expect(thresholds.maxManagementFeeLimit).toBe(2);
    expect(thresholds.maxVolatilityLimit).toBe(50);
  });

  it('should reject an inverted moderate range', () => {
    expect(() => resolveThresholds({ moderateMinExposure: 80 })).toThrow(
      'moderateMinExposure (80) is greater than moderateMaxExposure (70)'
    );
  });
});

describe('loadThresholds', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'portlang-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const file = path.join(tempDir, 'portlang.json');
    fs.writeFileSync(file, content, 'utf-8');
    return file;
  }

  it('should load thresholds from a file', () => {
    const file = writeConfig(JSON.stringify({ thresholds: { conservativeMaxExposure: 25 } }));

    expect(loadThresholds(file)).toEqual({ ...DEFAULT_THRESHOLDS, conservativeMaxExposure: 25 });
  });

  it('should accept a file without thresholds', () => {
    expect(loadThresholds(writeConfig('{}'))).toEqual(DEFAULT_THRESHOLDS);
  });

  it('should fail for a missing file', () => {
    const file = path.join(tempDir, 'missing.json');

    expect(() => loadThresholds(file)).toThrow(`Config file not found: ${file}`);
  });

  it('should fail for malformed JSON', () => {
    const file = writeConfig('{ thresholds: ');

    expect(() => loadThresholds(file)).toThrow(`Cannot parse config file ${file}`);
  });

  it('should reject unknown keys', () => {
    const file = writeConfig(JSON.stringify({ thresholds: { maxLeverage: 3 } }));

    expect(() => loadThresholds(file)).toThrow(`Invalid config file ${file}: thresholds`);
  });

  it('should reject out-of-range percentages', () => {
    const file = writeConfig(JSON.stringify({ thresholds: { maxVolatilityLimit: 150 } }));

    expect(() => loadThresholds(file)).toThrow(`Invalid config file ${file}: thresholds.maxVolatilityLimit:`);
  });
});
