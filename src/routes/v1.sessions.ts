import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import type { ZodType, ZodTypeDef } from "zod";
import {
  IdentityInput,
  PlaybackInput,
  SessionParams,
  StartSessionInput,
  SubmissionInput,
} from "../schemas/api.js";
import type { ListeningTestService } from "../session/service.js";
import { getRequestId } from "../utils/request-id.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";

/**
 * Parse a request part, replying 400 with error.v1 on failure. Returns
 * null once the reply has been sent.
 */
function parseOr400<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
  request: FastifyRequest,
  reply: FastifyReply
): T | null {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }
  void reply.status(400).send(zodErrorToErrorV1(parsed.error, getRequestId(request)));
  return null;
}

/**
 * Session API
 *
 * POST /v1/sessions                 start (auto-identifies from PROLIFIC_PID)
 * GET  /v1/sessions/:id             current view
 * POST /v1/sessions/:id/identity    email or participant id
 * POST /v1/sessions/:id/playback    a slot finished playing
 * POST /v1/sessions/:id/responses   rating for the current trial
 *
 * Participant mistakes come back as 200 `{accepted: false, reason, message, view}`.
 */
export async function sessionRoutes(app: FastifyInstance, service: ListeningTestService): Promise<void> {
  app.post("/v1/sessions", async (request, reply) => {
    const body = parseOr400(StartSessionInput, request.body ?? {}, request, reply);
    if (!body) return reply;

    const outcome = await service.start(body.url_params ?? {});
    return reply.status(201).send(outcome);
  });

  app.get("/v1/sessions/:id", async (request, reply) => {
    const params = parseOr400(SessionParams, request.params, request, reply);
    if (!params) return reply;

    return reply.send(await service.view(params.id));
  });

  app.post("/v1/sessions/:id/identity", async (request, reply) => {
    const params = parseOr400(SessionParams, request.params, request, reply);
    if (!params) return reply;
    const body = parseOr400(IdentityInput, request.body, request, reply);
    if (!body) return reply;

    return reply.send(await service.identify(params.id, body));
  });

  app.post("/v1/sessions/:id/playback", async (request, reply) => {
    const params = parseOr400(SessionParams, request.params, request, reply);
    if (!params) return reply;
    const body = parseOr400(PlaybackInput, request.body, request, reply);
    if (!body) return reply;

    return reply.send(await service.playback(params.id, body.trial_index, body.slot));
  });

  app.post("/v1/sessions/:id/responses", async (request, reply) => {
    const params = parseOr400(SessionParams, request.params, request, reply);
    if (!params) return reply;
    const body = parseOr400(SubmissionInput, request.body, request, reply);
    if (!body) return reply;

    return reply.send(await service.respond(params.id, body));
  });
}
