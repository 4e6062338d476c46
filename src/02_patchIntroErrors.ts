import { PATHS } from "./config/paths.config";
import { loadCorpusConfig } from "./config/corpus.config";
import { FileResultStore } from "./resultStore";
import { patchIntroErrors } from "./introErrorPatcher";
import { consoleLogger, logBanner } from "./utils/logger.utils";

/**
 * Flags chunk results whose transcription starts with text that is not in
 * the original (typically an English introduction)
 */
function patchResults(): void {
  try {
    logBanner(consoleLogger, "🩹  Patch Introduction Errors");

    const corpus = loadCorpusConfig();
    const store = new FileResultStore(PATHS.output.root);

    if (store.listRecordFiles().length === 0) {
      console.error(
        `❌ No individual chunk JSON files found in '${PATHS.output.root}' subdirectories.`
      );
      process.exit(1);
    }

    const summary = patchIntroErrors(store, {
      snippetWords: corpus.snippetWords,
      sentinelDistance: corpus.sentinelDistance,
    });

    console.log("\n--- Patching Complete ---");
    console.log(`Total files scanned: ${summary.scanned}`);
    console.log(`Total files modified: ${summary.modified}`);
    if (summary.unreadable > 0) {
      console.log(`⚠️  ${summary.unreadable} files could not be processed`);
    }
    if (summary.modified > 0) {
      console.log("\n📝 Next step: run the analysis again to update the reports.");
    } else {
      console.log("\n✅ No files needed patching.");
    }
  } catch (error) {
    console.error("\n❌ Error patching results:", error);
    if (error instanceof Error) {
      console.error(`   Message: ${error.message}`);
    }
    process.exit(1);
  }
}

// Run the patch function
patchResults();
