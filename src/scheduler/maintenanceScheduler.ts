import cron, { type ScheduledTask } from 'node-cron';
import mongoose from 'mongoose';

import type { StoreDriver } from '../config/engine.config.js';
import { SWEEP_CRON } from '../config/constants.js';
import type { ReminderEngine } from '../services/reminderEngine.service.js';
import { describeError } from '../utils/errors.js';

let isSchedulerRunning = false;
let mongoNotReadyLogged = false;

export interface MaintenanceOptions {
  storeDriver: StoreDriver;
  cronExpression?: string;
}

function isStoreReady(driver: StoreDriver): boolean {
  return driver === 'memory' || mongoose.connection.readyState === 1;
}

/**
 * Runs one sweep: expires sessions whose expiry timer never fired and
 * re-arms user timers that went missing (e.g. after a restart).
 */
export async function runMaintenanceSweep(
  engine: ReminderEngine,
  options: MaintenanceOptions
): Promise<void> {
  if (!isStoreReady(options.storeDriver)) {
    if (!mongoNotReadyLogged) {
      console.warn('⚠️ Mongo not connected yet, skipping this sweep');
      mongoNotReadyLogged = true;
    }
    return;
  }
  mongoNotReadyLogged = false;

  try {
    const { expired, rearmed } = await engine.sweep();
    if (expired > 0 || rearmed > 0) {
      console.log(
        `🧹 Sweep expired ${expired} session(s), re-armed ${rearmed} user(s)`
      );
    }
  } catch (error) {
    if (
      error instanceof Error &&
      (error.name === 'MongoNotConnectedError' ||
        /Client must be connected/.test(error.message))
    ) {
      console.warn(
        `⚠️ ${describeError(error)} inside maintenance sweep - skipping`
      );
      return;
    }
    console.error('❌ Error in maintenance sweep:', error);
  }
}

/**
 * Start the cron-driven maintenance sweep (every minute by default).
 */
export function startMaintenanceScheduler(
  engine: ReminderEngine,
  options: MaintenanceOptions
): ScheduledTask | null {
  if (isSchedulerRunning) {
    console.log('Maintenance scheduler is already running');
    return null;
  }

  const expression = options.cronExpression ?? SWEEP_CRON;
  const task = cron.schedule(expression, async () => {
    await runMaintenanceSweep(engine, options);
  });

  isSchedulerRunning = true;
  console.log(`🚀 Maintenance scheduler started (cron: ${expression})`);
  return task;
}
