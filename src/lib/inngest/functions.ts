import { inngest } from "./client";
import { schedule } from "../config";
import { handler } from "@/handler";

// ─── Monthly notifier ────────────────────────────────────────
// No retries: a failed run leaves the seen-set untouched and waits for the next tick.

export const monthlyNotifierJob = inngest.createFunction(
  { id: "collections-notifier-monthly", retries: 0 },
  { cron: schedule.cron },
  async ({ event }) => {
    return handler(event, { source: "inngest" });
  }
);

export const inngestFunctions = [monthlyNotifierJob];
