import fastify, { type FastifyError, type FastifyInstance } from "fastify";
import { z } from "zod";
import { config } from "./config";
import { WorkflowError } from "./errors";
import type { PitchWorkflowController } from "./pitch-workflow.controller";

export type PitchControllerLike = Pick<
  PitchWorkflowController,
  "start" | "decide" | "status" | "list" | "finalPackage" | "events" | "delete"
>;

export interface ServerDeps {
  controller: PitchControllerLike;
}

export interface ServerOptions {
  logger?: boolean;
}

const startSchema = z.object({
  description: z.string().trim().min(1).max(10_000),
  pitchType: z.enum(["elevator", "investor", "demo_day"]).optional()
});

const approvalSchema = z.object({
  approved: z.boolean(),
  feedback: z.string().max(4000).optional()
});

interface SessionParams {
  sessionId: string;
}

export const buildApp = (deps: ServerDeps, options: ServerOptions = {}): FastifyInstance => {
  const app = fastify({ logger: options.logger ?? true });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof WorkflowError) {
      return reply.code(error.statusCode).send({ error: error.message, code: error.code, retryable: error.retryable });
    }
    if (typeof error.statusCode === "number" && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: error.message });
    }
    request.log.error(error);
    return reply.code(500).send({ error: "Internal server error" });
  });

  app.get("/api/health", async () => ({
    ok: true,
    service: "pitch-workflow-orchestrator",
    model: config.model,
    now: new Date().toISOString()
  }));

  app.post("/api/pitch/start", async (request, reply) => {
    const parsed = startSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    const snapshot = await deps.controller.start(parsed.data);
    return reply.code(201).send(snapshot);
  });

  app.post<{ Params: SessionParams }>("/api/pitch/approve/:sessionId", async (request, reply) => {
    const parsed = approvalSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    return deps.controller.decide(request.params.sessionId, parsed.data);
  });

  app.get<{ Params: SessionParams }>("/api/pitch/status/:sessionId", async (request) =>
    deps.controller.status(request.params.sessionId)
  );

  app.get<{ Params: SessionParams }>("/api/pitch/final/:sessionId", async (request) =>
    deps.controller.finalPackage(request.params.sessionId)
  );

  app.delete<{ Params: SessionParams }>("/api/pitch/session/:sessionId", async (request) =>
    deps.controller.delete(request.params.sessionId)
  );

  app.get("/api/sessions", async () => deps.controller.list());

  app.get<{ Params: SessionParams }>("/api/sessions/:sessionId/events", async (request) => ({
    events: deps.controller.events(request.params.sessionId)
  }));

  return app;
};
