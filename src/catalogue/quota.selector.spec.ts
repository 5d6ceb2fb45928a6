import { selectQuota } from './quota.selector';

interface Item {
  name: string;
  rating?: number | null;
  isPreferred: boolean;
}

const items = (prefix: string, count: number, isPreferred: boolean): Item[] =>
  Array.from({ length: count }, (_, i) => ({
    name: `${prefix}${i}`,
    rating: i * 5,
    isPreferred,
  }));

describe('selectQuota', () => {
  it('takes every preferred item and tops up with the best others', () => {
    const pool = [...items('p', 15, true), ...items('o', 10, false)];

    const result = selectQuota(pool, 20);

    expect(result.fromPreferred).toBe(15);
    expect(result.fromOther).toBe(5);
    expect(result.selected).toHaveLength(20);
    expect(result.selected.slice(15).map((item) => item.name)).toEqual([
      'o9',
      'o8',
      'o7',
      'o6',
      'o5',
    ]);
  });

  it('orders by rating descending and keeps pool order on ties', () => {
    const pool: Item[] = [
      { name: 'a', rating: 70, isPreferred: true },
      { name: 'b', rating: 90, isPreferred: true },
      { name: 'c', rating: 70, isPreferred: true },
      { name: 'd', isPreferred: true },
    ];

    expect(selectQuota(pool, 10).selected.map((item) => item.name)).toEqual([
      'b',
      'a',
      'c',
      'd',
    ]);
  });

  it('uses only preferred items when they fill the quota', () => {
    const pool = [...items('o', 5, false), ...items('p', 8, true)];

    const result = selectQuota(pool, 3);

    expect(result.selected.map((item) => item.name)).toEqual(['p7', 'p6', 'p5']);
    expect(result.fromOther).toBe(0);
  });

  it('never pads beyond the pool', () => {
    const result = selectQuota(items('o', 2, false), 20);

    expect(result.selected).toHaveLength(2);
    expect(result).toMatchObject({ fromPreferred: 0, fromOther: 2 });
  });

  it('treats a missing rating as zero', () => {
    const pool: Item[] = [
      { name: 'unrated', rating: null, isPreferred: false },
      { name: 'rated', rating: 1, isPreferred: false },
    ];

    expect(selectQuota(pool, 1).selected[0].name).toBe('rated');
  });
});
