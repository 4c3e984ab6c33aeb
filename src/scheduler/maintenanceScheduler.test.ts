import { describe, it, expect } from 'vitest';

import { ManualClock } from '../clock/manualClock.js';
import { CardCatalog } from '../catalog/catalog.js';
import { DEFAULT_CARDS } from '../catalog/cards.js';
import { DEFAULT_ENGINE_CONFIG } from '../config/engine.config.js';
import { ReminderEngine } from '../services/reminderEngine.service.js';
import { createMemoryStores } from '../stores/memory.store.js';
import { runMaintenanceSweep } from './maintenanceScheduler.js';

describe('runMaintenanceSweep', () => {
  it('expires sessions left pending by a previous process', async () => {
    const clock = new ManualClock(new Date(0));
    const stores = createMemoryStores();
    const build = () =>
      new ReminderEngine({
        stores,
        clock,
        catalog: CardCatalog.build(DEFAULT_CARDS, { wellnessTipShare: 0.25 }),
        delivery: { deliverCard: async () => undefined },
        notifier: { notifyScore: async () => undefined },
        config: { ...DEFAULT_ENGINE_CONFIG, storeDriver: 'memory' },
        random: () => 0,
      });

    const previous = build();
    await previous.registerUser({ userId: 'u1', chatId: 'c1' });
    await previous.requestCard('u1');
    previous.stop();

    await clock.advanceBy(11 * 60_000);
    const engine = build();
    await runMaintenanceSweep(engine, { storeDriver: 'memory' });

    const [session] = await stores.sessions.listForUser('u1');
    expect(session).toMatchObject({
      status: 'expired',
      expiryReason: 'timeout',
    });
    expect(engine.hasTimer('tick', 'u1')).toBe(true);
    engine.stop();
  });
});
