import { PATHS } from "./config/paths.config";
import { loadCorpusConfig } from "./config/corpus.config";
import { FileResultStore } from "./resultStore";
import { runPurge } from "./flaggedAudioPurge";
import { consoleLogger, logBanner } from "./utils/logger.utils";

const DOIT = process.argv.includes("--doit");
const SYNC_DB = process.argv.includes("--sync-db");

/**
 * Lists the chunks above their purge threshold and, with --doit, deletes their audio
 */
async function removeFlaggedAudio(): Promise<void> {
  logBanner(consoleLogger, "🗑️  Remove Flagged Audio");

  if (SYNC_DB && !DOIT) {
    console.error("❌ --sync-db requires the --doit flag.");
    process.exit(1);
  }

  const corpus = loadCorpusConfig();
  const store = new FileResultStore(PATHS.output.root);

  if (store.listRecordFiles().length === 0) {
    console.error(
      `❌ No individual chunk JSON files found in '${PATHS.output.root}'.`
    );
    process.exit(1);
  }

  await runPurge({
    store,
    corpus,
    wavDir: PATHS.input.wav,
    doit: DOIT,
    syncDb: SYNC_DB,
  });
}

removeFlaggedAudio().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
