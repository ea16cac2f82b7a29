/**
 * Unit tests for SemanticValidator
 */

import { describe, it, expect } from 'vitest';
import { SemanticValidator } from '../../src/semantic-validator';
import { DiagnosticCollector } from '../../src/diagnostic-collector';
import { DEFAULT_THRESHOLDS, resolveThresholds } from '../../src/config';
import {
  AssetClass,
  Configuration,
  DiagnosticCategory,
  DiagnosticSeverity,
  PortfolioDocument,
  RebalancePolicy,
  Restrictions
} from '../../src/types';

function makeDocument(
  allocation: Array<[AssetClass, number]>,
  configuration: Configuration = { riskProfile: 'moderado' },
  restrictions: Restrictions = {},
  rebalance: RebalancePolicy = {}
): PortfolioDocument {
  return { configuration, allocation: new Map(allocation), restrictions, rebalance };
}

function run(document: PortfolioDocument | null, thresholds = DEFAULT_THRESHOLDS) {
  const diagnostics = new DiagnosticCollector();
  const valid = new SemanticValidator(diagnostics, thresholds).validate(document);
  return { valid, diagnostics: diagnostics.all() };
}

const BALANCED: Array<[AssetClass, number]> = [
  [AssetClass.DOMESTIC_EQUITIES, 30],
  [AssetClass.FIXED_INCOME, 50],
  [AssetClass.REAL_ESTATE_FUNDS, 20]
];

describe('SemanticValidator', () => {
  it('should accept a balanced moderate portfolio', () => {
    const { valid, diagnostics } = run(makeDocument(BALANCED));

    expect(valid).toBe(true);
    expect(diagnostics).toEqual([]);
  });

  it('should reject a missing document', () => {
    const { valid, diagnostics } = run(null);

    expect(valid).toBe(false);
    expect(diagnostics).toEqual([{
      category: DiagnosticCategory.SEMANTIC,
      severity: DiagnosticSeverity.ERROR,
      code: 'SEM001',
      message: 'Portfolio data is missing or invalid',
      suggestion: undefined
    }]);
  });

  describe('allocation total', () => {
    it('should reject an empty allocation without checking the total', () => {
      const { valid, diagnostics } = run(makeDocument([]));

      expect(valid).toBe(false);
      expect(diagnostics.map(d => d.code)).toEqual(['SEM002']);
      expect(diagnostics[0].suggestion).toBe('Add at least one asset class to the allocation section');
    });

    it('should report the excess over 100%', () => {
      const { diagnostics } = run(makeDocument([
        [AssetClass.DOMESTIC_EQUITIES, 40],
        [AssetClass.FIXED_INCOME, 70]
      ]));

      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0].code).toBe('SEM003');
      expect(diagnostics[0].message).toBe('Allocation total is 110%, exceeds 100%');
      expect(diagnostics[0].suggestion).toBe('Reduce allocations by 10%');
    });

    it('should report the amount missing from 100%', () => {
      const { diagnostics } = run(makeDocument([
        [AssetClass.DOMESTIC_EQUITIES, 40],
        [AssetClass.FIXED_INCOME, 50]
      ]));

      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0].code).toBe('SEM004');
      expect(diagnostics[0].message).toBe('Allocation total is 90%, missing 10%');
      expect(diagnostics[0].suggestion).toBe('Add 10% to other assets');
    });

    it('should tolerate a total within the epsilon', () => {
      const { valid } = run(makeDocument([
        [AssetClass.DOMESTIC_EQUITIES, 33.33],
        [AssetClass.FIXED_INCOME, 33.33],
        [AssetClass.REAL_ESTATE_FUNDS, 33.34]
      ]));

      expect(valid).toBe(true);
    });

    it('should report a shortfall just beyond the epsilon', () => {
      const { diagnostics } = run(makeDocument([
        [AssetClass.DOMESTIC_EQUITIES, 40],
        [AssetClass.FIXED_INCOME, 59.98]
      ]));

      expect(diagnostics.map(d => d.message)).toEqual(['Allocation total is 99.98%, missing 0.02%']);
    });
  });

  describe('percentage ranges', () => {
    it('should report every asset outside [0, 100]', () => {
      const { diagnostics } = run(makeDocument([
        [AssetClass.INTERNATIONAL_EQUITIES, 150],
        [AssetClass.FIXED_INCOME, -50]
      ], { riskProfile: 'arrojado' }));

      expect(diagnostics.map(d => d.message)).toEqual([
        'Allocation ações_internacionais: 150% is outside [0, 100]',
        'Allocation renda_fixa: -50% is outside [0, 100]'
      ]);
    });

    it('should accept 0% and 100%', () => {
      const { valid } = run(makeDocument([
        [AssetClass.FIXED_INCOME, 100],
        [AssetClass.DOMESTIC_EQUITIES, 0]
      ], { riskProfile: 'conservador' }));

      expect(valid).toBe(true);
    });
  });

  describe('risk profile', () => {
    it('should warn when no profile is declared', () => {
      const { valid, diagnostics } = run(makeDocument(BALANCED, {}));

      expect(valid).toBe(true);
      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0].code).toBe('SEM007');
      expect(diagnostics[0].severity).toBe(DiagnosticSeverity.WARNING);
    });

    it('should reject a conservative profile over its cap', () => {
      const { valid, diagnostics } = run(makeDocument([
        [AssetClass.DOMESTIC_EQUITIES, 60],
        [AssetClass.INTERNATIONAL_EQUITIES, 40]
      ], { riskProfile: 'conservador' }));

      expect(valid).toBe(false);
      expect(diagnostics.map(d => [d.code, d.message])).toEqual([
        ['SEM008', 'Conservative profile with 100% in high-risk assets']
      ]);
    });

    it('should accept a conservative profile at its cap', () => {
      const { valid, diagnostics } = run(makeDocument([
        [AssetClass.DOMESTIC_EQUITIES, 30],
        [AssetClass.FIXED_INCOME, 70]
      ], { riskProfile: 'conservador' }));

      expect(valid).toBe(true);
      expect(diagnostics).toEqual([]);
    });

    it('should warn for a moderate profile outside its range', () => {
      const { valid, diagnostics } = run(makeDocument([
        [AssetClass.DOMESTIC_EQUITIES, 80],
        [AssetClass.FIXED_INCOME, 20]
      ], { riskProfile: 'moderado' }));

      expect(valid).toBe(true);
      expect(diagnostics.map(d => [d.code, d.severity, d.message])).toEqual([
        ['SEM009', DiagnosticSeverity.WARNING, 'Moderate profile with 80% in high-risk assets']
      ]);
    });

    it('should warn for an aggressive profile under its floor', () => {
      const { diagnostics } = run(makeDocument([
        [AssetClass.MULTI_MARKET_FUNDS, 20],
        [AssetClass.FIXED_INCOME, 80]
      ], { riskProfile: 'arrojado' }));

      expect(diagnostics.map(d => [d.code, d.message])).toEqual([
        ['SEM011', 'Aggressive profile with only 20% in high-risk assets']
      ]);
    });

    it('should match profiles case-insensitively and accept English names', () => {
      const allocation: Array<[AssetClass, number]> = [[AssetClass.DOMESTIC_EQUITIES, 100]];

      expect(run(makeDocument(allocation, { riskProfile: ' Conservador ' })).diagnostics[0].code).toBe('SEM008');
      expect(run(makeDocument(allocation, { riskProfile: 'CONSERVATIVE' })).diagnostics[0].code).toBe('SEM008');
    });

    it('should leave an unknown profile unchecked', () => {
      const { valid, diagnostics } = run(makeDocument([[AssetClass.DOMESTIC_EQUITIES, 100]], { riskProfile: 'ousado' }));

      expect(valid).toBe(true);
      expect(diagnostics).toEqual([]);
    });
  });

  describe('restrictions', () => {
    it('should reject a volatility limit outside bounds', () => {
      const { diagnostics } = run(makeDocument(BALANCED, { riskProfile: 'moderado' }, { maxVolatility: 75 }));

      expect(diagnostics.map(d => [d.code, d.message, d.suggestion])).toEqual([
        ['SEM013', 'Invalid maximum volatility: 75%', 'Use values between 0% and 50%']
      ]);
    });

    it('should reject a management fee outside bounds', () => {
      const { diagnostics } = run(makeDocument(BALANCED, { riskProfile: 'moderado' }, { maxManagementFee: 7.5 }));

      expect(diagnostics.map(d => [d.code, d.message])).toEqual([
        ['SEM018', 'Invalid maximum management fee: 7.5%']
      ]);
    });

    it('should accept limits on the boundary', () => {
      const { valid } = run(makeDocument(BALANCED, { riskProfile: 'moderado' }, { maxVolatility: 50, maxManagementFee: 0 }));

      expect(valid).toBe(true);
    });
  });

  describe('custom thresholds', () => {
    it('should apply configured limits', () => {
      const thresholds = resolveThresholds({ conservativeMaxExposure: 10 });
      const { diagnostics } = run(makeDocument([
        [AssetClass.DOMESTIC_EQUITIES, 20],
        [AssetClass.FIXED_INCOME, 80]
      ], { riskProfile: 'conservador' }), thresholds);

      expect(diagnostics.map(d => d.suggestion)).toEqual([
        'Reduce exposure to equities and multi-market funds to at most 10%'
      ]);
    });
  });

  it('should run every check and keep their order', () => {
    const { diagnostics } = run(makeDocument([
      [AssetClass.DOMESTIC_EQUITIES, 120]
    ], { riskProfile: 'conservador' }, { maxVolatility: -1 }));

    expect(diagnostics.map(d => d.code)).toEqual(['SEM003', 'SEM005', 'SEM008', 'SEM013']);
  });

  it('should only count errors raised by the current call', () => {
    const diagnostics = new DiagnosticCollector();
    const validator = new SemanticValidator(diagnostics);

    expect(validator.validate(makeDocument([]))).toBe(false);
    expect(validator.validate(makeDocument(BALANCED))).toBe(true);
    expect(diagnostics.errorCount()).toBe(1);
  });
});
