import { createS3Client, S3BlobStore, SeenSetStore } from "../storage";
import type { NotifierConfig } from "../config";
import { ArchivesSpaceClient, type PublishedRecordSource } from "./archivesspace";
import { CartographerClient, type ArrangementMapSource } from "./cartographer";
import { findNewRecords } from "./diff";
import { buildMessageCard } from "./message";
import { createWebhookPoster, type CardPoster } from "./webhook";
import { reportingWindow } from "./window";
import type { NotifierRunResult, RunLog, SeenSet } from "./types";

export type SeenSetRepository = {
  load(): Promise<SeenSet>;
  save(records: SeenSet): Promise<void>;
};

export type NotifierDeps = {
  archivesSpace: PublishedRecordSource;
  cartographer: ArrangementMapSource;
  seenSet: SeenSetRepository;
  webhook: CardPoster;
};

export type NotifierRunOptions = {
  discoveryBaseUrl: string;
  dryRun?: boolean;
  now?: Date;
};

function log(logs: RunLog[], phase: string, message: string) {
  logs.push({ ts: new Date().toISOString(), phase, message });
  console.log(`[Notifier] ${phase}: ${message}`);
}

export function createNotifierDeps(config: NotifierConfig): NotifierDeps {
  const s3 = createS3Client(config.storage);
  return {
    archivesSpace: new ArchivesSpaceClient({ ...config.archivesSpace, timeoutMs: config.httpTimeoutMs }),
    cartographer: new CartographerClient({ ...config.cartographer, timeoutMs: config.httpTimeoutMs }),
    seenSet: new SeenSetStore(new S3BlobStore(s3, config.storage.bucket)),
    webhook: createWebhookPoster(config.webhookUrl, config.httpTimeoutMs),
  };
}

/**
 * One full run: window, load seen-set, fetch archival records, fetch maps,
 * diff, format, post, save. Strictly sequential; the first failure aborts
 * the run and nothing after it happens.
 *
 * The seen-set is replaced with this run's full archival result set.
 */
export async function executeNotifierRun(deps: NotifierDeps, options: NotifierRunOptions): Promise<NotifierRunResult> {
  const logs: RunLog[] = [];

  try {
    // 1. Reporting window
    const window = reportingWindow(options.now ?? new Date());
    log(logs, "init", `Window: ${window.from.toISOString()} – ${window.to.toISOString()}${options.dryRun ? " (dry run)" : ""}`);

    // 2. Previously reported records
    const seen = await deps.seenSet.load();
    log(logs, "load", `Previously seen: ${seen.length}`);

    // 3. Sources, one after the other
    const current = await deps.archivesSpace.fetchPublishedResources();
    log(logs, "fetch", `[ArchivesSpace] ${current.length} published resources`);

    const maps = await deps.cartographer.fetchUpdatedMaps(window.from);
    log(logs, "fetch", `[Cartographer] ${maps.length} updated maps`);

    // 4. Diff
    const newCollections = findNewRecords(current, seen);
    log(logs, "diff", `New collections: ${newCollections.length}`);

    // 5. Format
    const card = buildMessageCard(window, newCollections, maps, options.discoveryBaseUrl);

    const result: NotifierRunResult = {
      window: { from: window.from.toISOString(), to: window.to.toISOString() },
      fetchedCount: current.length,
      newCollections: newCollections.length,
      updatedMaps: maps.length,
      posted: false,
      saved: false,
      logs,
    };

    if (options.dryRun) {
      log(logs, "notify", `Dry run, card not posted:\n${JSON.stringify(card, null, 2)}`);
      log(logs, "persist", "Dry run, seen-set not saved");
      return result;
    }

    // 6. Deliver
    const status = await deps.webhook.post(card);
    result.posted = true;
    log(logs, "notify", `Webhook responded ${status}`);

    // 7. Persist. A crash between 6 and 7 re-reports the same records next run.
    await deps.seenSet.save(current);
    result.saved = true;
    log(logs, "persist", `Saved ${current.length} records`);

    return result;
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error";
    logs.push({ ts: new Date().toISOString(), phase: "error", message });
    console.error(`[Notifier] Run failed: ${message}`);
    throw err;
  }
}
