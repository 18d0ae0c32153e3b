/**
 * Watch the drop folder and fan URLs out to per-site queues
 * Usage: npx tsx scripts/watch-folder.ts
 */

import 'dotenv/config';
import { ConfigError, loadConfig } from '../apps/ingester/src/lib/config';
import { createNotifier, EmailNotifier } from '../apps/ingester/src/lib/notify';
import { logError, logInfo } from '../apps/ingester/src/lib/observability/logger';
import { createSiteQueues } from '../apps/ingester/src/lib/queue/site-queue';
import type { SiteQueue } from '../apps/ingester/src/lib/queue/site-queue';
import { FolderWatcher } from '../apps/ingester/src/lib/scheduler/folder-watcher';
import { KNOWN_SITES } from '../apps/ingester/src/lib/sites';

// Download workers live elsewhere; this stand-in only reports what they would receive
async function logConsumer(queue: SiteQueue, signal: AbortSignal): Promise<void> {
  while (!signal.aborted) {
    try {
      const item = await queue.dequeue(signal);
      logInfo('Ready for download', { queue: queue.name, site: item.site, url: item.normalizedUrl });
    } catch (error) {
      if (signal.aborted) return;
      throw error;
    }
  }
}

async function main() {
  const config = loadConfig();
  const queues = createSiteQueues(
    KNOWN_SITES.map((site) => site.id),
    config.queueCapacity
  );

  const controller = new AbortController();
  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.once(sig, () => {
      logInfo('Shutdown requested', { signal: sig });
      controller.abort();
    });
  }

  const notifier = createNotifier(config.notify);
  if (notifier instanceof EmailNotifier) {
    // Logged on failure, not fatal
    await notifier.verify();
  }

  const watcher = new FolderWatcher(config.watch, {
    destinations: queues,
    notifier,
  });

  await Promise.all([
    watcher.run(controller.signal),
    ...Array.from(queues.values(), (queue) => logConsumer(queue, controller.signal)),
  ]);
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    logError('Folder watcher cannot start', error, { issues: error.issues });
  } else {
    logError('Folder watcher crashed', error);
  }
  process.exitCode = 1;
});
