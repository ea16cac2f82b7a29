/**
 * Portfolio Metrics - Exposure figures shared by validation and reporting
 */

import { AssetClass, Allocation, PortfolioDocument, RiskProfile, ValidationThresholds } from './types';

export const HIGH_RISK_ASSETS: readonly AssetClass[] = [
  AssetClass.DOMESTIC_EQUITIES,
  AssetClass.INTERNATIONAL_EQUITIES,
  AssetClass.MULTI_MARKET_FUNDS
];

export const CONSERVATIVE_ASSETS: readonly AssetClass[] = [
  AssetClass.FIXED_INCOME,
  AssetClass.REAL_ESTATE_FUNDS
];

const PROFILE_ALIASES: ReadonlyMap<string, RiskProfile> = new Map([
  ['conservador', RiskProfile.CONSERVATIVE],
  ['conservative', RiskProfile.CONSERVATIVE],
  ['moderado', RiskProfile.MODERATE],
  ['moderate', RiskProfile.MODERATE],
  ['arrojado', RiskProfile.AGGRESSIVE],
  ['aggressive', RiskProfile.AGGRESSIVE]
]);

export type Level = 'High' | 'Medium' | 'Moderate' | 'Low';

export interface PortfolioMetrics {
  assetClassCount: number;
  totalAllocated: number;
  highRiskExposure: number;
  conservativeExposure: number;
  diversification: Level;
  highRiskLevel: Level;
  conservativeLevel: Level;
  totalIsComplete: boolean;
  /** undefined when no recognised profile is declared */
  profileCompatible?: boolean;
}

/**
 * Map a declared profile string onto a known profile, case-insensitively
 */
export function normalizeProfile(profile: string): RiskProfile | undefined {
  return PROFILE_ALIASES.get(profile.trim().toLowerCase());
}

export function sumAllocation(allocation: Allocation, assets?: readonly AssetClass[]): number {
  let total = 0;
  for (const [asset, percentage] of allocation) {
    if (assets === undefined || assets.includes(asset)) {
      total += percentage;
    }
  }
  return total;
}

export function riskExposure(allocation: Allocation): number {
  return sumAllocation(allocation, HIGH_RISK_ASSETS);
}

/**
 * Format a percentage with at most two decimals: 10, 3.5, 33.33
 */
export function formatPercent(value: number): string {
  return String(Number.parseFloat(value.toFixed(2)));
}

export function isProfileCompatible(
  profile: RiskProfile,
  exposure: number,
  thresholds: ValidationThresholds
): boolean {
  switch (profile) {
    case RiskProfile.CONSERVATIVE:
      return exposure <= thresholds.conservativeMaxExposure;
    case RiskProfile.MODERATE:
      return exposure >= thresholds.moderateMinExposure && exposure <= thresholds.moderateMaxExposure;
    case RiskProfile.AGGRESSIVE:
      return exposure >= thresholds.aggressiveMinExposure;
  }
}

function exposureLevel(exposure: number): Level {
  if (exposure > 60) return 'High';
  if (exposure > 30) return 'Moderate';
  return 'Low';
}

function diversificationLevel(count: number): Level {
  if (count >= 4) return 'High';
  if (count >= 2) return 'Medium';
  return 'Low';
}

export function computeMetrics(document: PortfolioDocument, thresholds: ValidationThresholds): PortfolioMetrics {
  const { allocation } = document;
  const totalAllocated = sumAllocation(allocation);
  const highRiskExposure = riskExposure(allocation);
  const conservativeExposure = sumAllocation(allocation, CONSERVATIVE_ASSETS);
  const declared = document.configuration.riskProfile;
  const profile = declared !== undefined ? normalizeProfile(declared) : undefined;

  return {
    assetClassCount: allocation.size,
    totalAllocated,
    highRiskExposure,
    conservativeExposure,
    diversification: diversificationLevel(allocation.size),
    highRiskLevel: exposureLevel(highRiskExposure),
    conservativeLevel: exposureLevel(conservativeExposure),
    totalIsComplete: Math.abs(totalAllocated - 100) <= thresholds.allocationEpsilon,
    profileCompatible: profile !== undefined
      ? isProfileCompatible(profile, highRiskExposure, thresholds)
      : undefined
  };
}

/**
 * Plain-language recommendations for a portfolio
 */
export function recommend(document: PortfolioDocument, thresholds: ValidationThresholds): string[] {
  const { allocation } = document;
  const recommendations: string[] = [];

  if (allocation.size > 0) {
    const total = sumAllocation(allocation);
    if (Math.abs(total - 100) > thresholds.allocationEpsilon) {
      if (total > 100) {
        recommendations.push(`Adjust allocation: reduce ${formatPercent(total - 100)}% to reach 100%`);
      } else {
        recommendations.push(`Complete allocation: add ${formatPercent(100 - total)}% to reach 100%`);
      }
    }

    const declared = document.configuration.riskProfile;
    const profile = declared !== undefined ? normalizeProfile(declared) : undefined;
    const exposure = riskExposure(allocation);

    if (profile === RiskProfile.CONSERVATIVE && exposure > thresholds.conservativeMaxExposure) {
      recommendations.push('Reduce exposure to high-risk assets to fit the conservative profile');
    } else if (profile === RiskProfile.AGGRESSIVE && exposure < thresholds.aggressiveMinExposure) {
      recommendations.push('Consider increasing exposure to high-risk assets for the aggressive profile');
    }

    if (allocation.size < 3) {
      recommendations.push('Improve diversification by adding more asset classes');
    }

    const largest = Math.max(...allocation.values());
    if (largest > 80) {
      recommendations.push('Reduce concentration: no asset class should exceed 80%');
    }
  }

  if (recommendations.length === 0) {
    recommendations.push('Portfolio is well structured; keep monitoring it regularly');
    recommendations.push('Review periodically as market conditions change');
    recommendations.push('Rebalance according to the configured tolerance');
  }

  return recommendations;
}
