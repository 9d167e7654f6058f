import { discoveryDocument, discoveryTextLines } from './discovery_report';
import type { DiscoveryReportInput } from './discovery_report';
import { DiscoveryLoadError } from '../discovery';
import { createUnit } from '../__fixtures__/units';

function input(overrides: Partial<DiscoveryReportInput> = {}): DiscoveryReportInput {
  return {
    units: [
      createUnit('a', { category: 'regression' }),
      createUnit('b', { category: 'regression' }),
      createUnit('c', { category: 'integration' }),
      createUnit('d'),
    ],
    loadErrors: [],
    structure: { hierarchical: false, tagged: true },
    ...overrides,
  };
}

describe('discovery report', () => {
  describe('discoveryTextLines', () => {
    it('should print the total and one line per category', () => {
      expect(discoveryTextLines(input(), 1)).toEqual([
        'Total tests discovered: 4',
        'Regression: 2',
        'Integration: 1',
        'Development: 0',
        'Uncategorized: 1',
      ]);
    });

    it('should describe the structure and list uncategorized tests at verbosity 2', () => {
      expect(discoveryTextLines(input(), 2).slice(5)).toEqual([
        '',
        'Hierarchical structure: no',
        'Tag-based structure: yes',
        '',
        'Uncategorized tests:',
        '  tests/test_sample.test.js::d',
      ]);
    });

    it('should list every test by category at verbosity 3', () => {
      const lines = discoveryTextLines(input(), 3);

      expect(lines.slice(lines.indexOf('Regression tests:'))).toEqual([
        'Regression tests:',
        '  tests/test_sample.test.js::a',
        '  tests/test_sample.test.js::b',
        '',
        'Integration tests:',
        '  tests/test_sample.test.js::c',
        '',
        'Uncategorized tests:',
        '  tests/test_sample.test.js::d',
      ]);
    });

    it('should count and explain load errors', () => {
      const loadError = new DiscoveryLoadError('tests/broken.test.js', new Error('Unexpected token'));
      const lines = discoveryTextLines(input({ loadErrors: [loadError] }), 2);

      expect(lines).toContain('Load errors: 1');
      expect(lines).toContain('  ! Could not load test source tests/broken.test.js: Unexpected token');
    });
  });

  describe('discoveryDocument', () => {
    const now = new Date('2024-03-01T10:00:00.000Z');

    it('should hold the counts at verbosity 1', () => {
      expect(discoveryDocument(input(), 1, now)).toEqual({
        discovery_summary: {
          timestamp: '2024-03-01T10:00:00.000Z',
          total_tests: 4,
          categories: { regression: 2, integration: 1, development: 0, uncategorized: 1 },
          load_errors: 0,
        },
      });
    });

    it('should add uncategorized tests at 2 and the full mapping at 3', () => {
      const atTwo = discoveryDocument(input(), 2, now).discovery_summary;
      const atThree = discoveryDocument(input(), 3, now).discovery_summary;

      expect(atTwo.uncategorized_tests).toEqual(['tests/test_sample.test.js::d']);
      expect(atTwo.tests_by_category).toBeUndefined();
      expect(atThree.tests_by_category).toEqual({
        regression: ['tests/test_sample.test.js::a', 'tests/test_sample.test.js::b'],
        integration: ['tests/test_sample.test.js::c'],
        development: [],
        uncategorized: ['tests/test_sample.test.js::d'],
      });
    });
  });
});
