/**
 * Report Renderer - Plain-text report for a validated portfolio
 */

import { AssetClass, PortfolioDocument, ReportRenderer, ValidationThresholds } from './types';
import { DEFAULT_THRESHOLDS } from './config';
import { HIGH_RISK_ASSETS, computeMetrics, formatPercent, recommend } from './portfolio-metrics';

const ASSET_LABELS: Record<AssetClass, string> = {
  [AssetClass.DOMESTIC_EQUITIES]: 'Domestic Equities',
  [AssetClass.INTERNATIONAL_EQUITIES]: 'International Equities',
  [AssetClass.REAL_ESTATE_FUNDS]: 'Real Estate Funds',
  [AssetClass.MULTI_MARKET_FUNDS]: 'Multi-Market Funds',
  [AssetClass.FIXED_INCOME]: 'Fixed Income'
};

const NOT_SET = 'Not set';

export interface TextReportOptions {
  thresholds?: ValidationThresholds;
  /** Source of the generation timestamp */
  now?: () => Date;
}

export class TextReportRenderer implements ReportRenderer {
  private readonly thresholds: ValidationThresholds;
  private readonly now: () => Date;

  constructor(options: TextReportOptions = {}) {
    this.thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
    this.now = options.now ?? (() => new Date());
  }

  render(document: PortfolioDocument): string {
    const sections = [
      this.renderHeader(document),
      this.renderAllocation(document),
      this.renderAnalysis(document),
      this.renderDistribution(document),
      this.renderRestrictions(document),
      this.renderRebalance(document),
      this.renderRecommendations(document)
    ];

    return sections.filter((section): section is string => section !== null).join('\n\n') + '\n';
  }

  private renderHeader(document: PortfolioDocument): string {
    const { name, riskProfile, horizon } = document.configuration;
    return [
      '# Portfolio Report',
      '',
      '## General Information',
      table(['Field', 'Value'], [
        ['Portfolio name', name ?? NOT_SET],
        ['Risk profile', riskProfile !== undefined ? titleCase(riskProfile) : NOT_SET],
        ['Time horizon', horizon !== undefined ? `${horizon.amount} ${horizon.unit}` : NOT_SET],
        ['Generated at', this.now().toISOString()]
      ])
    ].join('\n');
  }

  private renderAllocation(document: PortfolioDocument): string {
    const entries = sortedAllocation(document);
    if (entries.length === 0) {
      return '## Asset Allocation\nNo asset allocation defined.';
    }

    const rows = entries.map(([asset, percentage]) => [
      ASSET_LABELS[asset],
      `${formatPercent(percentage)}%`,
      HIGH_RISK_ASSETS.includes(asset) ? 'High risk' : 'Low risk'
    ]);
    const total = entries.reduce((sum, [, percentage]) => sum + percentage, 0);
    rows.push(['TOTAL', `${formatPercent(total)}%`, '']);

    return `## Asset Allocation\n${table(['Asset class', 'Percent', 'Risk'], rows)}`;
  }

  private renderAnalysis(document: PortfolioDocument): string | null {
    if (document.allocation.size === 0) {
      return null;
    }

    const metrics = computeMetrics(document, this.thresholds);
    const totalStatus = metrics.totalIsComplete
      ? 'Complete (100%)'
      : `Incomplete (${formatPercent(metrics.totalAllocated)}%)`;
    let profileStatus = 'Profile not recognised';
    if (metrics.profileCompatible !== undefined) {
      profileStatus = metrics.profileCompatible ? 'Matches profile' : 'Needs attention';
    }

    return `## Portfolio Analysis\n${table(['Metric', 'Value', 'Status'], [
      ['Asset classes', String(metrics.assetClassCount), metrics.diversification],
      ['Total allocated', `${formatPercent(metrics.totalAllocated)}%`, totalStatus],
      ['High-risk exposure', `${formatPercent(metrics.highRiskExposure)}%`, metrics.highRiskLevel],
      ['Conservative exposure', `${formatPercent(metrics.conservativeExposure)}%`, metrics.conservativeLevel],
      ['Profile compatibility', profileStatus, '']
    ])}`;
  }

  private renderDistribution(document: PortfolioDocument): string | null {
    const entries = sortedAllocation(document);
    if (entries.length === 0) {
      return null;
    }

    // One block per full 5%
    const rows = entries.map(([asset, percentage]) => [
      ASSET_LABELS[asset],
      `${formatPercent(percentage)}%`,
      '█'.repeat(Math.max(0, Math.floor(percentage / 5))) + '░'
    ]);

    return `## Distribution\n${table(['Asset class', 'Percent', 'Bar (█ = 5%)'], rows)}`;
  }

  private renderRestrictions(document: PortfolioDocument): string | null {
    const { maxVolatility, maxManagementFee } = document.restrictions;
    const rows: string[][] = [];
    if (maxVolatility !== undefined) {
      rows.push(['Maximum volatility', `${formatPercent(maxVolatility)}%`]);
    }
    if (maxManagementFee !== undefined) {
      rows.push(['Maximum management fee', `${formatPercent(maxManagementFee)}%`]);
    }
    return rows.length > 0 ? `## Restrictions\n${table(['Restriction', 'Limit'], rows)}` : null;
  }

  private renderRebalance(document: PortfolioDocument): string | null {
    const { frequency, tolerance } = document.rebalance;
    const rows: string[][] = [];
    if (frequency !== undefined) {
      rows.push(['Frequency', titleCase(frequency)]);
    }
    if (tolerance !== undefined) {
      rows.push(['Tolerance', `${formatPercent(tolerance)}%`]);
    }
    return rows.length > 0 ? `## Rebalancing\n${table(['Parameter', 'Value'], rows)}` : null;
  }

  private renderRecommendations(document: PortfolioDocument): string {
    const lines = recommend(document, this.thresholds).map(text => `- ${text}`);
    return `## Recommendations\n${lines.join('\n')}`;
  }
}

/** Allocation entries, largest first; ties keep declaration order */
function sortedAllocation(document: PortfolioDocument): Array<[AssetClass, number]> {
  return [...document.allocation.entries()].sort((a, b) => b[1] - a[1]);
}

function titleCase(text: string): string {
  return text.length > 0 ? text[0].toUpperCase() + text.slice(1) : text;
}

/**
 * Render rows as a pipe table with columns padded to their widest cell
 */
export function table(header: string[], rows: string[][]): string {
  const all = [header, ...rows];
  const widths = header.map((_, col) => Math.max(...all.map(row => (row[col] ?? '').length)));
  const format = (row: string[]) =>
    `| ${widths.map((width, col) => (row[col] ?? '').padEnd(width)).join(' | ')} |`;
  const separator = `| ${widths.map(width => '-'.repeat(width)).join(' | ')} |`;
  return [format(header), separator, ...rows.map(format)].join('\n');
}
