import type {
  CardDefinition,
  CardKind,
  ExerciseCard,
  ExerciseType,
} from '../types/core.js';

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export interface WeightedItem<T> {
  item: T;
  weight: number;
}

export function pickWeighted<T>(
  items: readonly WeightedItem<T>[],
  random: RandomSource
): T {
  const total = items.reduce((sum, entry) => sum + entry.weight, 0);
  if (items.length === 0 || total <= 0) {
    throw new Error('Cannot pick from an empty weighted set');
  }

  let remaining = random() * total;
  for (const entry of items) {
    remaining -= entry.weight;
    if (remaining < 0) return entry.item;
  }
  // random() close to 1 can leave a rounding remainder
  return items[items.length - 1].item;
}

export interface CatalogOptions {
  wellnessTipShare: number;
}

/**
 * Card pool with selection weights normalized so tips hold `wellnessTipShare`
 * of the total and exercises split the rest evenly per exercise type.
 */
export class CardCatalog {
  private readonly byId: Map<string, CardDefinition>;

  private constructor(
    private readonly weighted: readonly WeightedItem<CardDefinition>[]
  ) {
    this.byId = new Map(weighted.map((w) => [w.item.id, w.item]));
  }

  static build(
    cards: readonly CardDefinition[],
    options: CatalogOptions
  ): CardCatalog {
    const ids = new Set<string>();
    for (const card of cards) {
      if (ids.has(card.id)) throw new Error(`Duplicate card id: ${card.id}`);
      ids.add(card.id);
      if (!(card.weight > 0)) {
        throw new Error(`Card ${card.id} must have a positive weight`);
      }
      if (card.kind === 'exercise' && !(card.minDurationSeconds > 0)) {
        throw new Error(`Card ${card.id} must have a positive duration`);
      }
    }

    const exercises = cards.filter(
      (card): card is ExerciseCard => card.kind === 'exercise'
    );
    const tips = cards.filter((card) => card.kind === 'wellness_tip');
    if (exercises.length === 0) {
      throw new Error('Catalog needs at least one exercise card');
    }

    const tipShare = tips.length > 0 ? options.wellnessTipShare : 0;
    const tipWeightSum = tips.reduce((sum, card) => sum + card.weight, 0);

    const byType = new Map<ExerciseType, ExerciseCard[]>();
    for (const card of exercises) {
      const list = byType.get(card.exerciseType) ?? [];
      list.push(card);
      byType.set(card.exerciseType, list);
    }
    const typeShare = (1 - tipShare) / byType.size;

    const weighted: WeightedItem<CardDefinition>[] = [];
    for (const list of byType.values()) {
      const sum = list.reduce((acc, card) => acc + card.weight, 0);
      for (const card of list) {
        weighted.push({ item: card, weight: (typeShare * card.weight) / sum });
      }
    }
    for (const card of tips) {
      weighted.push({ item: card, weight: (tipShare * card.weight) / tipWeightSum });
    }

    return new CardCatalog(weighted);
  }

  get(cardId: string): CardDefinition | undefined {
    return this.byId.get(cardId);
  }

  all(): CardDefinition[] {
    return this.weighted.map((w) => w.item);
  }

  pick(random: RandomSource): CardDefinition {
    return pickWeighted(this.weighted, random);
  }

  /** Normalized selection probability of one card. */
  probabilityOf(cardId: string): number {
    return this.weighted.find((w) => w.item.id === cardId)?.weight ?? 0;
  }

  shareOf(kind: CardKind): number {
    return this.weighted
      .filter((w) => w.item.kind === kind)
      .reduce((sum, w) => sum + w.weight, 0);
  }

  longestDurationSeconds(): number {
    return Math.max(
      ...this.weighted.map((w) =>
        w.item.kind === 'exercise' ? w.item.minDurationSeconds : 0
      )
    );
  }
}
