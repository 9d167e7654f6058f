import { TestRegistry, toDescriptor } from './test_registry';
import type { TestUnit } from './test_registry.types';
import type { TestCategory } from '../test_tags';

function makeUnit(name: string, category: TestCategory): TestUnit {
  return {
    id: `tests/sample.test.js::${name}`,
    name,
    qualifiedName: name,
    suitePath: [],
    filePath: '/repo/tests/sample.test.js',
    relativePath: 'tests/sample.test.js',
    category,
    slow: false,
    skipCi: false,
    synthetic: false,
    run: () => undefined,
  };
}

describe('TestRegistry', () => {
  const units = [
    makeUnit('a', 'regression'),
    makeUnit('b', 'integration'),
    makeUnit('c', 'regression'),
    makeUnit('d', 'uncategorized'),
  ];

  it('should keep discovery order and look up by id', () => {
    const registry = new TestRegistry(units);

    expect(registry.units.map(u => u.name)).toEqual(['a', 'b', 'c', 'd']);
    expect(registry.get('tests/sample.test.js::c')?.category).toBe('regression');
    expect(registry.has('tests/sample.test.js::zz')).toBe(false);
    expect(registry.size).toBe(4);
  });

  it('should freeze units', () => {
    const registry = new TestRegistry([makeUnit('a', 'regression')]);

    expect(Object.isFrozen(registry.units)).toBe(true);
    expect(Object.isFrozen(registry.units[0])).toBe(true);
  });

  it('should reject duplicate ids', () => {
    expect(() => new TestRegistry([makeUnit('a', 'regression'), makeUnit('a', 'development')]))
      .toThrow('Duplicate test unit id: tests/sample.test.js::a');
  });

  it('should group and count by category', () => {
    const registry = new TestRegistry(units);

    expect(registry.byCategory().regression.map(u => u.name)).toEqual(['a', 'c']);
    expect(registry.countByCategory()).toEqual({
      regression: 2,
      integration: 1,
      development: 0,
      uncategorized: 1,
    });
    expect(registry.activeCategories()).toEqual(['regression', 'integration', 'uncategorized']);
  });

  it('should filter with a predicate', () => {
    const registry = new TestRegistry(units);

    expect(registry.filter(u => u.category === 'integration').map(u => u.name)).toEqual(['b']);
  });

  it('should strip the callable when building a descriptor', () => {
    const descriptor = toDescriptor(makeUnit('a', 'regression'));

    expect('run' in descriptor).toBe(false);
    expect(descriptor.id).toBe('tests/sample.test.js::a');
    expect(Object.isFrozen(descriptor)).toBe(true);
  });
});
