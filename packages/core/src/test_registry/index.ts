export { TestRegistry, toDescriptor, emptyCategoryMap } from './test_registry';
export type { TestUnit, TestUnitDescriptor, TestBody } from './test_registry.types';
