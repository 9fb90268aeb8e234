import { compareSortPaths, type SortKey } from '../items/pathComponent';

const key = (priority: number, name: string, position: number | null = null): SortKey => ({ priority, name, position });

describe('compareSortPaths', () => {
  test('priority wins over name', () => {
    expect(compareSortPaths([key(7, 'Z')], [key(9, 'A')])).toBeLessThan(0);
  });

  test('names compare by code unit, not by locale', () => {
    expect(compareSortPaths([key(9, 'Zeta')], [key(9, 'alpha')])).toBeLessThan(0);
  });

  test('positions order anonymous siblings', () => {
    expect(compareSortPaths([key(10, '', 2)], [key(10, '', 0)])).toBeGreaterThan(0);
    expect(compareSortPaths([key(10, 'x', null)], [key(10, 'x', 0)])).toBeLessThan(0);
  });

  test('a proper prefix sorts first', () => {
    const parent = [key(9, 'Model')];
    const child = [key(9, 'Model'), key(10, 'a')];
    expect(compareSortPaths(parent, child)).toBeLessThan(0);
    expect(compareSortPaths(child, parent)).toBeGreaterThan(0);
    expect(compareSortPaths(child, [...child])).toBe(0);
  });
});
