import { describe, expect, it } from 'vitest';
import { HwpxDocument } from '../src/hwpx/document.js';
import { IdGenerator, STRUCTURAL_ID_MAX, STRUCTURAL_ID_MIN } from '../src/hwpx/ids.js';

const draw = (gen: IdGenerator, n: number): number[] => Array.from({ length: n }, () => gen.next());

describe('IdGenerator', () => {
  it('replays the same sequence for the same seed', () => {
    expect(draw(new IdGenerator(42), 50)).toEqual(draw(new IdGenerator(42), 50));
  });

  it('gives different sequences for different seeds', () => {
    expect(draw(new IdGenerator(42), 5)).not.toEqual(draw(new IdGenerator(43), 5));
  });

  it('stays in range and never repeats', () => {
    const gen = new IdGenerator(7);
    const ids = draw(gen, 1000);
    expect(new Set(ids).size).toBe(1000);
    expect(gen.size).toBe(1000);
    for (const id of ids) {
      expect(id).toBeGreaterThanOrEqual(STRUCTURAL_ID_MIN);
      expect(id).toBeLessThanOrEqual(STRUCTURAL_ID_MAX);
    }
  });

  it('draws random IDs without a seed', () => {
    const gen = new IdGenerator();
    expect(gen.deterministic).toBe(false);
    const ids = draw(gen, 20);
    expect(new Set(ids).size).toBe(20);
    expect(ids.every((id) => id >= STRUCTURAL_ID_MIN && id <= STRUCTURAL_ID_MAX)).toBe(true);
  });

  it('counts names per prefix', () => {
    const gen = new IdGenerator(1);
    expect([gen.nextName('image'), gen.nextName('image'), gen.nextName('chart'), gen.nextName('image')]).toEqual([
      'image1',
      'image2',
      'chart1',
      'image3',
    ]);
  });

  it('keeps state per document', () => {
    const a = new HwpxDocument({ seed: 9 });
    const b = new HwpxDocument({ seed: 9 });
    const first = a.addTable(['x'], []);
    a.addTable(['y'], []);
    const other = b.addTable(['x'], []);
    expect(other.id).toBe(first.id);
    expect(other.rows[0][0].subListId).toBe(first.rows[0][0].subListId);
  });
});
