import { PATHS } from "./config/paths.config";
import { TRANSCRIPTION_CONFIG } from "./config/transcription.config";
import { loadCorpusConfig } from "./config/corpus.config";
import { FileResultStore } from "./resultStore";
import { dispatchAudioCheck } from "./dispatcher";
import { generateFinalReport } from "./finalReport";
import { FatalTranscriberError, createTranscriber } from "./transcriber";
import { BANNER, consoleLogger, logBanner } from "./utils/logger.utils";

/**
 * Transcribes every chunk that has no result yet, scores it against its
 * text and regenerates the final report
 */
async function audioCheck(): Promise<void> {
  logBanner(consoleLogger, "🎧  Audio Check");

  const corpus = loadCorpusConfig();
  const store = new FileResultStore(PATHS.output.root);
  const transcriber = createTranscriber();

  console.log(`📂 Audio:   ${PATHS.input.wav}`);
  console.log(`📂 Texts:   ${PATHS.input.chapters}`);
  console.log(`📂 Results: ${PATHS.output.root}`);
  console.log(`🎙️  Transcriber: ${transcriber.name} (${TRANSCRIPTION_CONFIG.LOCALE})\n`);

  try {
    const summary = await dispatchAudioCheck({
      wavDir: PATHS.input.wav,
      chaptersDir: PATHS.input.chapters,
      store,
      transcriber,
      workers: TRANSCRIPTION_CONFIG.WORKERS,
    });

    console.log(`\n${BANNER}`);
    console.log("📊 Summary:");
    console.log(`   • Audio files found: ${summary.totalAudioFiles}`);
    console.log(`   • Pending chunks: ${summary.pending}`);
    console.log(`   • Results written: ${summary.written}`);
    if (summary.missingText > 0) {
      console.log(`   • Missing text files: ${summary.missingText}`);
    }
    if (summary.failed > 0) {
      console.log(`   • Errors: ${summary.failed}`);
    }
    console.log(`${BANNER}`);
  } catch (error) {
    if (error instanceof FatalTranscriberError) {
      console.error(`\n❌ Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  generateFinalReport(store, corpus.deficientThresholdPercent);
}

audioCheck().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
