/**
 * Property-Based Tests for the Compiler
 *
 * Well-formed portfolios compile cleanly; arbitrary input never throws.
 */

import { describe, test, expect } from 'vitest';
import * as fc from 'fast-check';
import { compile } from '../../src/compiler';
import { riskExposure } from '../../src/portfolio-metrics';
import { AssetClass, DiagnosticSeverity } from '../../src/types';

const ALL_ASSETS = Object.values(AssetClass);

/**
 * Integer percentages over a non-empty subset of asset classes, summing to 100
 */
const allocationGenerator = fc.shuffledSubarray(ALL_ASSETS, { minLength: 1 }).chain(assets =>
  fc.array(fc.integer({ min: 0, max: 100 }), { minLength: assets.length - 1, maxLength: assets.length - 1 })
    .map(cuts => {
      const bounds = [0, ...[...cuts].sort((a, b) => a - b), 100];
      return assets.map((asset, i): [AssetClass, number] => [asset, bounds[i + 1] - bounds[i]]);
    })
);

function profileFor(exposure: number): string {
  if (exposure <= 30) return 'conservador';
  if (exposure >= 50) return 'arrojado';
  return 'moderado';
}

function renderSource(allocation: Array<[AssetClass, number]>, profile: string): string {
  const lines = allocation.map(([asset, percentage]) => `        ${asset} = ${percentage}%;`);
  return [
    'carteira {',
    '    nome = "Gerada";',
    `    perfil = "${profile}";`,
    '    horizonte_temporal = 10 anos;',
    '    alocação {',
    ...lines,
    '    }',
    '}'
  ].join('\n');
}

describe('Property: well-formed portfolios', () => {
  test('a complete allocation with a matching profile compiles without diagnostics', () => {
    fc.assert(
      fc.property(allocationGenerator, (allocation) => {
        const exposure = riskExposure(new Map(allocation));
        const result = compile(renderSource(allocation, profileFor(exposure)));

        expect(result.diagnostics).toEqual([]);
        expect(result.document?.allocation.size).toBe(allocation.length);
      }),
      { numRuns: 200 }
    );
  });
});

describe('Property: arbitrary input', () => {
  test('compile never throws and a missing document is always explained', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 300 }), (source) => {
        const result = compile(source);

        if (result.document === null) {
          expect(result.diagnostics.some(d => d.severity === DiagnosticSeverity.ERROR)).toBe(true);
        }
      }),
      { numRuns: 300 }
    );
  });

  test('compiling the same source twice gives equal results', () => {
    const tokenish = fc.constantFrom(
      'carteira', 'alocação', 'renda_fixa', 'perfil', 'nome', '=', '{', '}', ';', '%', '"x"', '10', ' ', '\n'
    );

    fc.assert(
      fc.property(fc.array(tokenish, { maxLength: 60 }), (parts) => {
        const source = parts.join(' ');

        expect(compile(source)).toEqual(compile(source));
      }),
      { numRuns: 200 }
    );
  });
});
