import "dotenv/config";

import path from "node:path";

import { createForge } from "./app.js";
import { loadRuntimeConfig } from "./config/runtimeConfig.js";
import { isPipelineError } from "./domain/errors.js";

async function main(): Promise<void> {
  const runtimeConfig = loadRuntimeConfig();
  const [directoryArgument, courseArgument, ...rest] = process.argv.slice(2);
  const pdfDirectory = path.resolve(process.cwd(), directoryArgument ?? "pdfs");
  const courseName = courseArgument ?? path.basename(pdfDirectory);
  const translateTo = rest
    .filter((argument) => argument.startsWith("--translate="))
    .flatMap((argument) => argument.slice("--translate=".length).split(","))
    .map((code) => code.trim())
    .filter(Boolean);

  console.log(
    `[bootstrap] provider chain ${runtimeConfig.providers.map((provider) => `${provider.name}:${provider.model}`).join(" -> ")}`
  );

  const { orchestrator, translationAgent } = createForge(runtimeConfig);
  const result = await orchestrator.runDirectory(courseName, pdfDirectory);

  if (result.lessonIds.length === 0) {
    console.log(`No readable PDFs found in ${pdfDirectory}. Add files and rerun npm run dev.`);
    return;
  }

  if (result.quizId) {
    for (const languageCode of translateTo) {
      const translated = await translationAgent.translateQuiz(result.quizId, languageCode, { onlyMissing: true });
      console.log(
        `[bootstrap] ${languageCode}: ${translated.okItems.length} translated, ${translated.failedItems.length} failed`
      );
    }
  }

  console.log(`Course "${courseName}": ${result.lessonIds.length} lesson(s), ${result.questionCount} question(s)`);
  console.log(`  Question bank: ${result.exports.questionBankPath}`);
  console.log(`  Course ontology: ${result.exports.courseOntologyPath}`);
  console.log(`  Run artifacts: ${result.runDirectory}`);
  console.log(`  Agent traces: ${result.tracesPath}`);
  if (result.failedItems.length > 0) {
    console.log(`  Failed items: ${result.failedItems.length}`);
  }
}

main().catch((error: unknown) => {
  if (isPipelineError(error)) {
    console.error(`Pipeline failed (${error.kind}): ${error.message}`);
  } else if (error instanceof Error) {
    console.error(`Pipeline failed: ${error.message}`);
  } else {
    console.error("Pipeline failed due to an unknown error.");
  }

  process.exitCode = 1;
});
