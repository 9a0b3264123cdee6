#!/usr/bin/env node
import { createInterface } from "node:readline/promises";
import { createPitchWorkflow } from "./bootstrap";
import { assertConfig } from "./config";
import { OpenAiClient } from "./llm/openaiClient";
import { OpenAiWebSearch } from "./llm/webSearch";
import type { PitchType, SessionEvent, SessionSnapshot } from "./types";

const PITCH_TYPES: readonly PitchType[] = ["elevator", "investor", "demo_day"];

const getArgValue = (name: string): string | undefined => {
  const marker = `--${name}`;
  const index = process.argv.findIndex((arg) => arg === marker);
  if (index === -1) return undefined;
  return process.argv[index + 1];
};

const parsePitchType = (value: string | undefined): PitchType | undefined =>
  PITCH_TYPES.find((type) => type === value?.trim().toLowerCase());

const printSnapshot = (snapshot: SessionSnapshot): void => {
  console.log(`\n${"=".repeat(60)}`);
  console.log(`Phase: ${snapshot.phase}  (auto refines ${snapshot.autoRefineCount}, total iterations ${snapshot.totalIterationCount})`);
  console.log("=".repeat(60));
  console.log(`\nCurrent pitch:\n${snapshot.pitch ?? "(none)"}\n`);
  if (snapshot.critique) {
    console.log(`Critique score: ${snapshot.critique.overall}/10 (${snapshot.critique.decision})`);
    console.log(`Feedback: ${snapshot.critique.feedback}`);
  }
};

const printEvent = (event: SessionEvent): void => {
  if (event.type === "prompt_logged") return;
  const phaseText = event.phase ? ` [${event.phase}#${event.iteration ?? 0}]` : "";
  console.log(`[${event.timestamp}] [${event.role}]${phaseText} ${event.type}: ${event.message}`);
};

const main = async (): Promise<void> => {
  const description = getArgValue("description")?.trim();
  const pitchTypeRaw = getArgValue("pitch-type");
  const pitchType = parsePitchType(pitchTypeRaw);

  if (!description || (pitchTypeRaw !== undefined && !pitchType)) {
    console.error('Usage: npm run cli -- --description "What you built and for whom" [--pitch-type elevator|investor|demo_day]');
    process.exit(1);
  }

  assertConfig();

  const llm = new OpenAiClient();
  await llm.assertModelAvailable();
  const search = new OpenAiWebSearch({
    onFailure: (query, message) => console.warn(`Web search failed for "${query}": ${message}`)
  });
  const { store, controller } = createPitchWorkflow({ llm, search });
  const unsubscribe = store.subscribeAll(printEvent);
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  try {
    console.log("\n[START] Starting pitch workflow...\n");
    let snapshot = await controller.start({ description, pitchType });

    while (snapshot.phase === "AWAITING_APPROVAL") {
      printSnapshot(snapshot);
      const answer = (await rl.question("Options: [A]pprove or [R]eject. Your decision (A/R): ")).trim().toUpperCase();
      if (answer === "A") {
        snapshot = await controller.decide(snapshot.sessionId, { approved: true });
      } else if (answer === "R") {
        const feedback = await rl.question("What should be improved? ");
        snapshot = await controller.decide(snapshot.sessionId, { approved: false, feedback });
      }
    }

    printSnapshot(snapshot);
    if (snapshot.phase === "CAPPED") {
      console.log("\nIteration limit reached; the package below is built from the last draft.");
    }
    console.log(`\n${"=".repeat(60)}\nFINAL PITCH PACKAGE\n${"=".repeat(60)}`);
    console.log(JSON.stringify(snapshot.finalPackage ?? null, null, 2));
  } finally {
    unsubscribe();
    rl.close();
  }
};

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(message);
  process.exit(1);
});
