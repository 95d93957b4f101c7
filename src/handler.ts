import { resolveConfig } from "@/lib/config";
import { createNotifierDeps, executeNotifierRun } from "@/lib/notifier/runner";
import type { NotifierRunResult } from "@/lib/notifier/types";

/**
 * Serverless entry point. The trigger event and context are opaque; every
 * invocation resolves configuration (and decrypts secrets) once, then runs
 * the pipeline to completion or throws.
 */
export async function handler(_event?: unknown, _context?: unknown): Promise<NotifierRunResult> {
  const config = await resolveConfig(process.env);
  return executeNotifierRun(createNotifierDeps(config), {
    discoveryBaseUrl: config.discoveryBaseUrl,
    dryRun: config.dryRun,
  });
}
