/**
 * Semantic Validator - Applies portfolio domain rules to a parsed document
 */

import {
  PortfolioDocument,
  ValidationThresholds,
  RiskProfile,
  DiagnosticCategory,
  DiagnosticSeverity
} from './types';
import { DiagnosticCollector } from './diagnostic-collector';
import { DEFAULT_THRESHOLDS } from './config';
import { formatPercent, normalizeProfile, riskExposure, sumAllocation } from './portfolio-metrics';

export class SemanticValidator {
  private readonly thresholds: ValidationThresholds;

  constructor(
    private readonly diagnostics: DiagnosticCollector,
    thresholds: ValidationThresholds = DEFAULT_THRESHOLDS
  ) {
    this.thresholds = thresholds;
  }

  /**
   * Validate a document. Returns true when this call raised no error-severity
   * diagnostic; warnings and infos never fail validation.
   *
   * Checks run in a fixed order and never short-circuit each other:
   * 1. Allocation presence and total
   * 2. Per-asset percentage range
   * 3. Risk profile consistency
   * 4. Restriction bounds
   */
  validate(document: PortfolioDocument | null): boolean {
    const errorsBefore = this.diagnostics.errorCount();

    if (document === null) {
      this.error('SEM001', 'Portfolio data is missing or invalid');
      return false;
    }

    this.checkAllocationTotal(document);
    this.checkPercentageRanges(document);
    this.checkRiskProfile(document);
    this.checkRestrictions(document);

    return this.diagnostics.errorCount() === errorsBefore;
  }

  private checkAllocationTotal(document: PortfolioDocument): void {
    if (document.allocation.size === 0) {
      this.error('SEM002', 'No asset allocation defined',
        'Add at least one asset class to the allocation section');
      return;
    }

    const total = sumAllocation(document.allocation);
    if (Math.abs(total - 100) <= this.thresholds.allocationEpsilon) {
      return;
    }

    if (total > 100) {
      this.error('SEM003', `Allocation total is ${formatPercent(total)}%, exceeds 100%`,
        `Reduce allocations by ${formatPercent(total - 100)}%`);
    } else {
      this.error('SEM004', `Allocation total is ${formatPercent(total)}%, missing ${formatPercent(100 - total)}%`,
        `Add ${formatPercent(100 - total)}% to other assets`);
    }
  }

  private checkPercentageRanges(document: PortfolioDocument): void {
    for (const [asset, percentage] of document.allocation) {
      if (percentage < 0 || percentage > 100) {
        this.error('SEM005', `Allocation ${asset}: ${formatPercent(percentage)}% is outside [0, 100]`,
          'Use percentages between 0% and 100%');
      }
    }
  }

  private checkRiskProfile(document: PortfolioDocument): void {
    const declared = document.configuration.riskProfile;
    if (declared === undefined) {
      this.diagnostics.add({
        category: DiagnosticCategory.SEMANTIC,
        severity: DiagnosticSeverity.WARNING,
        code: 'SEM007',
        message: 'Risk profile not defined',
        suggestion: "Set perfil to 'conservador', 'moderado' or 'arrojado'"
      });
      return;
    }

    // Unrecognised profiles are left unchecked
    const profile = normalizeProfile(declared);
    const exposure = riskExposure(document.allocation);
    const { conservativeMaxExposure, moderateMinExposure, moderateMaxExposure, aggressiveMinExposure } = this.thresholds;

    if (profile === RiskProfile.CONSERVATIVE && exposure > conservativeMaxExposure) {
      this.error('SEM008', `Conservative profile with ${formatPercent(exposure)}% in high-risk assets`,
        `Reduce exposure to equities and multi-market funds to at most ${formatPercent(conservativeMaxExposure)}%`);
    } else if (profile === RiskProfile.MODERATE && (exposure < moderateMinExposure || exposure > moderateMaxExposure)) {
      this.warning('SEM009', `Moderate profile with ${formatPercent(exposure)}% in high-risk assets`,
        `Keep exposure between ${formatPercent(moderateMinExposure)}% and ${formatPercent(moderateMaxExposure)}% for a moderate profile`);
    } else if (profile === RiskProfile.AGGRESSIVE && exposure < aggressiveMinExposure) {
      this.warning('SEM011', `Aggressive profile with only ${formatPercent(exposure)}% in high-risk assets`,
        `Consider raising exposure to at least ${formatPercent(aggressiveMinExposure)}%`);
    }
  }

  private checkRestrictions(document: PortfolioDocument): void {
    const { maxVolatility, maxManagementFee } = document.restrictions;

    if (maxVolatility !== undefined && (maxVolatility < 0 || maxVolatility > this.thresholds.maxVolatilityLimit)) {
      this.error('SEM013', `Invalid maximum volatility: ${formatPercent(maxVolatility)}%`,
        `Use values between 0% and ${formatPercent(this.thresholds.maxVolatilityLimit)}%`);
    }

    if (maxManagementFee !== undefined && (maxManagementFee < 0 || maxManagementFee > this.thresholds.maxManagementFeeLimit)) {
      this.error('SEM018', `Invalid maximum management fee: ${formatPercent(maxManagementFee)}%`,
        `Use values between 0% and ${formatPercent(this.thresholds.maxManagementFeeLimit)}%`);
    }
  }

  private error(code: string, message: string, suggestion?: string): void {
    this.diagnostics.add({
      category: DiagnosticCategory.SEMANTIC,
      severity: DiagnosticSeverity.ERROR,
      code,
      message,
      suggestion
    });
  }

  private warning(code: string, message: string, suggestion?: string): void {
    this.diagnostics.add({
      category: DiagnosticCategory.SEMANTIC,
      severity: DiagnosticSeverity.WARNING,
      code,
      message,
      suggestion
    });
  }
}
