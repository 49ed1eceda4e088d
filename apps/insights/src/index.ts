import { closePool } from './db.js';
import { processNextJob } from './processor.js';
import { CONFIG } from './config.js';

let shouldStop = false;

export async function run() {
  process.on('SIGINT', handleShutdown);
  process.on('SIGTERM', handleShutdown);

  console.log('[insights] worker booted');
  while (!shouldStop) {
    try {
      const processed = await processNextJob();
      if (!processed) {
        await sleep(CONFIG.pollIntervalMs);
      }
    } catch (error) {
      console.error('[insights] worker encountered an error', error);
      await sleep(CONFIG.pollIntervalMs);
    }
  }

  await closePool();
  console.log('[insights] worker stopped');
}

function handleShutdown() {
  shouldStop = true;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

if (import.meta.url === `file://${process.argv[1]}`) {
  run().catch((err) => {
    console.error('[insights] worker failed', err);
    process.exit(1);
  });
}
