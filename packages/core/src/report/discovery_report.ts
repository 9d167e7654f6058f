import type { DiscoveryResult } from '../discovery';
import type { TestUnit } from '../test_registry';
import { emptyCategoryMap } from '../test_registry';
import { TEST_CATEGORIES } from '../test_tags';
import type { DiscoveryReportDocument, ReportVerbosity } from './report.types';
import { categoryLabel } from './text';

export type DiscoveryReportInput = {
  /** Units left after filtering */
  units: readonly TestUnit[];
  loadErrors: DiscoveryResult['loadErrors'];
  structure: DiscoveryResult['structure'];
};

function idsByCategory(units: readonly TestUnit[]) {
  const grouped = emptyCategoryMap<string[]>(() => []);
  for (const unit of units) {
    grouped[unit.category].push(unit.id);
  }
  return grouped;
}

/**
 * @example
 * ```
 * Total tests discovered: 6
 * Regression: 3
 * Integration: 2
 * Development: 0
 * Uncategorized: 1
 * ```
 */
export function discoveryTextLines(input: DiscoveryReportInput, verbosity: ReportVerbosity): string[] {
  const grouped = idsByCategory(input.units);
  const lines = [`Total tests discovered: ${input.units.length}`];
  for (const category of TEST_CATEGORIES) {
    lines.push(`${categoryLabel(category)}: ${grouped[category].length}`);
  }
  if (input.loadErrors.length > 0) {
    lines.push(`Load errors: ${input.loadErrors.length}`);
  }

  if (verbosity >= 2) {
    lines.push('');
    lines.push(`Hierarchical structure: ${input.structure.hierarchical ? 'yes' : 'no'}`);
    lines.push(`Tag-based structure: ${input.structure.tagged ? 'yes' : 'no'}`);
    for (const loadError of input.loadErrors) {
      lines.push(`  ! ${loadError.message}`);
    }
  }

  if (verbosity >= 3) {
    for (const category of TEST_CATEGORIES) {
      if (grouped[category].length === 0) continue;
      lines.push('');
      lines.push(`${categoryLabel(category)} tests:`);
      for (const id of grouped[category]) {
        lines.push(`  ${id}`);
      }
    }
  } else if (verbosity === 2 && grouped.uncategorized.length > 0) {
    lines.push('');
    lines.push('Uncategorized tests:');
    for (const id of grouped.uncategorized) {
      lines.push(`  ${id}`);
    }
  }

  return lines;
}

export function discoveryDocument(
  input: DiscoveryReportInput,
  verbosity: ReportVerbosity,
  now: Date = new Date()
): DiscoveryReportDocument {
  const grouped = idsByCategory(input.units);
  const categories = emptyCategoryMap(() => 0);
  for (const category of TEST_CATEGORIES) {
    categories[category] = grouped[category].length;
  }

  return {
    discovery_summary: {
      timestamp: now.toISOString(),
      total_tests: input.units.length,
      categories,
      load_errors: input.loadErrors.length,
      ...(verbosity >= 2 && { uncategorized_tests: grouped.uncategorized }),
      ...(verbosity >= 3 && { tests_by_category: grouped }),
    },
  };
}
