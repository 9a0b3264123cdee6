import { createPitchWorkflow } from "./bootstrap";
import { assertConfig, config } from "./config";
import { OpenAiClient } from "./llm/openaiClient";
import { OpenAiWebSearch } from "./llm/webSearch";
import { buildApp } from "./serverApp";

const llm = new OpenAiClient();
const search = new OpenAiWebSearch({
  onFailure: (query, message) => app.log.warn({ query, message }, "web search failed; continuing without market research")
});
const { store, engine, controller } = createPitchWorkflow({ llm, search });

const app = buildApp({ controller });

const degradedEventTypes = new Set(["step_degraded", "malformed_response"]);

store.subscribeAll((event) => {
  if (event.type === "prompt_logged") {
    app.log.debug({ sessionId: event.sessionId, role: event.role, ...event.data }, event.message);
    return;
  }
  const entry = { sessionId: event.sessionId, role: event.role, type: event.type, phase: event.phase, iteration: event.iteration };
  if (degradedEventTypes.has(event.type)) {
    app.log.warn(entry, event.message);
  } else {
    app.log.info(entry, event.message);
  }
});

const pruneTimer = setInterval(() => {
  const pruned = engine.pruneIdle(config.sessionIdleTtlMs);
  if (pruned.length > 0) {
    app.log.info({ pruned }, `Pruned ${pruned.length} idle session(s).`);
  }
}, Math.min(config.sessionIdleTtlMs, 60_000));
pruneTimer.unref();

const start = async (): Promise<void> => {
  assertConfig();
  await llm.assertModelAvailable();
  await app.listen({ port: config.port, host: "0.0.0.0" });
};

start().catch((error: unknown) => {
  app.log.error({ err: error }, "server failed to start");
  process.exit(1);
});
