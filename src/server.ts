import "dotenv/config";
import { createServer, type RequestListener } from "http";
import { serve } from "inngest/node";
import { inngest } from "@/lib/inngest/client";
import { inngestFunctions } from "@/lib/inngest/functions";
import { schedule } from "@/lib/config";

/**
 * Inngest endpoint for the scheduled notifier.
 *
 * INNGEST_SIGNING_KEY must be set outside Inngest dev mode; otherwise anyone
 * could trigger a run. Without it every request gets a 503.
 */

const blocked: RequestListener = (_req, res) => {
  console.warn("[inngest] Blocked: INNGEST_SIGNING_KEY not configured");
  res.writeHead(503, { "Content-Type": "application/json" });
  res.end(JSON.stringify({ error: "Inngest not configured (INNGEST_SIGNING_KEY required)" }));
};

const devMode = process.env.INNGEST_DEV === "1";
const signingKey = process.env.INNGEST_SIGNING_KEY;

const listener: RequestListener =
  signingKey || devMode ? serve({ client: inngest, functions: inngestFunctions }) : blocked;

createServer(listener).listen(schedule.port, () => {
  console.log(`[server] Inngest endpoint listening on :${schedule.port} (cron "${schedule.cron}")`);
});
