import { describe, it, expect } from 'vitest';

import { CardCatalog, pickWeighted, type RandomSource } from './catalog.js';
import { DEFAULT_CARDS } from './cards.js';
import type { CardDefinition } from '../types/core.js';

function seeded(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

describe('pickWeighted', () => {
  const items = [
    { item: 'a', weight: 1 },
    { item: 'b', weight: 3 },
  ];

  it('maps the random draw onto cumulative weights', () => {
    expect(pickWeighted(items, () => 0)).toBe('a');
    expect(pickWeighted(items, () => 0.24)).toBe('a');
    expect(pickWeighted(items, () => 0.25)).toBe('b');
    expect(pickWeighted(items, () => 0.999999)).toBe('b');
  });

  it('refuses an empty set', () => {
    expect(() => pickWeighted([], () => 0.5)).toThrow(
      'Cannot pick from an empty weighted set'
    );
  });
});

describe('CardCatalog', () => {
  const catalog = CardCatalog.build(DEFAULT_CARDS, { wellnessTipShare: 0.25 });

  it('gives wellness tips a quarter of the weight', () => {
    expect(catalog.shareOf('wellness_tip')).toBeCloseTo(0.25);
    expect(catalog.shareOf('exercise')).toBeCloseTo(0.75);
  });

  it('splits exercise weight evenly across exercise types', () => {
    // five types share 0.75, two cards per type
    expect(catalog.probabilityOf('pushups-10')).toBeCloseTo(0.075);
    expect(catalog.probabilityOf('walk-2min')).toBeCloseTo(0.075);
    expect(catalog.probabilityOf('tip-eyes')).toBeCloseTo(0.0625);
  });

  it('reports the longest exercise duration', () => {
    expect(catalog.longestDurationSeconds()).toBe(120);
  });

  it('looks cards up by id', () => {
    expect(catalog.get('plank-30')?.kind).toBe('exercise');
    expect(catalog.get('missing')).toBeUndefined();
  });

  it('converges to the configured tip ratio over many draws', () => {
    const random = seeded(42);
    const draws = 20_000;
    let tips = 0;
    for (let i = 0; i < draws; i++) {
      if (catalog.pick(random).kind === 'wellness_tip') tips += 1;
    }
    expect(Math.abs(tips / draws - 0.25)).toBeLessThan(0.02);
  });

  it('is deterministic for a fixed random source', () => {
    const drawIds = (random: RandomSource) =>
      Array.from({ length: 10 }, () => catalog.pick(random).id);
    expect(drawIds(seeded(7))).toEqual(drawIds(seeded(7)));
  });

  it('gives all weight to exercises when there are no tips', () => {
    const onlyExercises = DEFAULT_CARDS.filter((c) => c.kind === 'exercise');
    const built = CardCatalog.build(onlyExercises, { wellnessTipShare: 0.25 });
    expect(built.shareOf('exercise')).toBeCloseTo(1);
  });

  it('rejects malformed catalogs', () => {
    const tip: CardDefinition = {
      id: 'tip',
      kind: 'wellness_tip',
      text: 'Drink water',
      weight: 1,
    };
    expect(() => CardCatalog.build([tip], { wellnessTipShare: 0.25 })).toThrow(
      'Catalog needs at least one exercise card'
    );
    expect(() =>
      CardCatalog.build([tip, tip], { wellnessTipShare: 0.25 })
    ).toThrow('Duplicate card id: tip');
    expect(() =>
      CardCatalog.build(
        [
          {
            id: 'bad',
            kind: 'exercise',
            exerciseType: 'squats',
            text: 'Squat',
            minDurationSeconds: 0,
            weight: 1,
          },
        ],
        { wellnessTipShare: 0.25 }
      )
    ).toThrow('Card bad must have a positive duration');
  });
});
