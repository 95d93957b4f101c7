import "dotenv/config";
import { handler } from "@/handler";

// Run the notifier once from a shell, outside any scheduler
handler({ source: "cli" })
  .then((result) => {
    console.log(
      `[Notifier] Done: ${result.newCollections} new collections, ${result.updatedMaps} updated maps` +
        (result.posted ? "" : " (not posted)")
    );
  })
  .catch((error) => {
    console.error(error);
    process.exit(1);
  });
