/**
 * Core type definitions for PortLang
 */

// ============================================================================
// Token Types
// ============================================================================

export enum TokenKind {
  // Section and field keywords
  CARTEIRA = 'CARTEIRA',
  NOME = 'NOME',
  PERFIL = 'PERFIL',
  HORIZONTE_TEMPORAL = 'HORIZONTE_TEMPORAL',
  ALOCACAO = 'ALOCACAO',
  RESTRICOES = 'RESTRICOES',
  REBALANCEAMENTO = 'REBALANCEAMENTO',

  // Asset classes
  ACOES_NACIONAIS = 'ACOES_NACIONAIS',
  ACOES_INTERNACIONAIS = 'ACOES_INTERNACIONAIS',
  FUNDOS_IMOBILIARIOS = 'FUNDOS_IMOBILIARIOS',
  FUNDOS_MULTIMERCADO = 'FUNDOS_MULTIMERCADO',
  RENDA_FIXA = 'RENDA_FIXA',

  // Restriction and rebalance parameters
  VOLATILIDADE_MAXIMA = 'VOLATILIDADE_MAXIMA',
  TAXA_ADMINISTRATIVA_MAXIMA = 'TAXA_ADMINISTRATIVA_MAXIMA',
  FREQUENCIA = 'FREQUENCIA',
  TOLERANCIA = 'TOLERANCIA',

  // Temporal values
  ANOS = 'ANOS',
  MESES = 'MESES',
  MENSAL = 'MENSAL',
  TRIMESTRAL = 'TRIMESTRAL',
  SEMESTRAL = 'SEMESTRAL',
  ANUAL = 'ANUAL',

  // Punctuation
  EQUALS = 'EQUALS',
  LEFT_BRACE = 'LEFT_BRACE',
  RIGHT_BRACE = 'RIGHT_BRACE',
  SEMICOLON = 'SEMICOLON',
  PERCENT = 'PERCENT',

  // Literals
  STRING = 'STRING',
  NUMBER = 'NUMBER',
  IDENTIFIER = 'IDENTIFIER',

  EOF = 'EOF'
}

export type TokenValue = string | number | null;

export interface Token {
  readonly kind: TokenKind;
  readonly value: TokenValue;
  readonly line: number;    // 1-based
  readonly column: number;  // 1-based, first character of the token
}

// ============================================================================
// Diagnostic Types
// ============================================================================

export enum DiagnosticCategory {
  LEXICAL = 'lexical',
  SYNTACTIC = 'syntactic',
  SEMANTIC = 'semantic',
  VALIDATION = 'validation',
  GENERATION = 'generation'
}

export enum DiagnosticSeverity {
  ERROR = 'error',
  WARNING = 'warning',
  INFO = 'info'
}

export interface SourceLocation {
  line: number;
  column: number;
}

export interface Diagnostic {
  readonly category: DiagnosticCategory;
  readonly severity: DiagnosticSeverity;
  readonly code: string;     // Stable identifier, e.g. LEX001, SYN001, SEM003
  readonly message: string;
  readonly location?: SourceLocation;
  readonly suggestion?: string;
}

// ============================================================================
// Document Types
// ============================================================================

export enum AssetClass {
  DOMESTIC_EQUITIES = 'ações_nacionais',
  INTERNATIONAL_EQUITIES = 'ações_internacionais',
  REAL_ESTATE_FUNDS = 'fundos_imobiliarios',
  MULTI_MARKET_FUNDS = 'fundos_multimercado',
  FIXED_INCOME = 'renda_fixa'
}

export enum HorizonUnit {
  YEARS = 'anos',
  MONTHS = 'meses'
}

export enum RebalanceFrequency {
  MONTHLY = 'mensal',
  QUARTERLY = 'trimestral',
  SEMIANNUAL = 'semestral',
  ANNUAL = 'anual'
}

export interface Horizon {
  readonly amount: number;
  readonly unit: HorizonUnit;
}

export interface Configuration {
  readonly name?: string;
  readonly riskProfile?: string;
  readonly horizon?: Horizon;
}

/** Percent per asset class, in first-assignment order */
export type Allocation = ReadonlyMap<AssetClass, number>;

export interface Restrictions {
  readonly maxVolatility?: number;
  readonly maxManagementFee?: number;
}

export interface RebalancePolicy {
  readonly frequency?: RebalanceFrequency;
  readonly tolerance?: number;
}

/**
 * Parsed portfolio. All four sections are always present, possibly empty.
 * A document may still be semantically invalid; the validator decides.
 */
export interface PortfolioDocument {
  readonly configuration: Configuration;
  readonly allocation: Allocation;
  readonly restrictions: Restrictions;
  readonly rebalance: RebalancePolicy;
}

// ============================================================================
// Compilation Types
// ============================================================================

export interface CompileResult {
  document: PortfolioDocument | null;
  diagnostics: Diagnostic[];
}

export interface RenderResult {
  report: string | null;
  diagnostics: Diagnostic[];
}

/**
 * Turns a validated document into a formatted artifact.
 * Implementations only read the document.
 */
export interface ReportRenderer {
  render(document: PortfolioDocument): string;
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface ValidationThresholds {
  /** Absolute deviation from 100% tolerated for the allocation total */
  allocationEpsilon: number;
  conservativeMaxExposure: number;
  moderateMinExposure: number;
  moderateMaxExposure: number;
  aggressiveMinExposure: number;
  maxVolatilityLimit: number;
  maxManagementFeeLimit: number;
}

export enum RiskProfile {
  CONSERVATIVE = 'conservador',
  MODERATE = 'moderado',
  AGGRESSIVE = 'arrojado'
}

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIOptions {
  file: string;
  configPath?: string;
  outputPath?: string;
  json?: boolean;       // Print diagnostics as JSON (check)
  verbose?: boolean;    // Print source size and diagnostic counts
}
