import { PATHS } from "./config/paths.config";
import { loadCorpusConfig } from "./config/corpus.config";
import { FileResultStore } from "./resultStore";
import { logPartitionSummary, scanResults } from "./resultScanner";
import { analyzeSubdivision } from "./errorAnalysis";
import { consoleLogger, logBanner } from "./utils/logger.utils";

/**
 * Partitions all chunk results by subdivision and writes the four error
 * rate reports for each
 */
function analyzeErrorRates(): void {
  try {
    logBanner(consoleLogger, "📊  Error Rate Analysis");

    const corpus = loadCorpusConfig();
    const store = new FileResultStore(PATHS.output.root);

    const scan = scanResults(store, corpus);
    if (scan.totalFiles === 0) {
      console.error(
        `❌ No individual chunk JSON files found in '${PATHS.output.root}' subdirectories.`
      );
      process.exit(1);
    }

    logPartitionSummary(scan);

    for (const partition of scan.partitions) {
      analyzeSubdivision(partition, store);
    }

    console.log("\n✅ Analysis complete.");
  } catch (error) {
    console.error("\n❌ Error analyzing results:", error);
    if (error instanceof Error) {
      console.error(`   Message: ${error.message}`);
    }
    process.exit(1);
  }
}

// Run the analysis
analyzeErrorRates();
