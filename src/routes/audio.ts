import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { extname, resolve, sep } from "node:path";
import type { FastifyInstance } from "fastify";
import { buildErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";

export const AUDIO_CONTENT_TYPES: Readonly<Record<string, string>> = {
  ".wav": "audio/wav",
  ".mp3": "audio/mpeg",
  ".m4a": "audio/mp4",
  ".flac": "audio/flac",
  ".ogg": "audio/ogg",
  ".aac": "audio/aac",
};

/**
 * Absolute path for a request path under root, or null when it escapes
 * the root or is not an audio file
 */
export function resolveAudioPath(root: string, requested: string): string | null {
  const base = resolve(root);
  const target = resolve(base, requested);
  if (target !== base && !target.startsWith(base + sep)) {
    return null;
  }
  if (!(extname(target).toLowerCase() in AUDIO_CONTENT_TYPES)) {
    return null;
  }
  return target;
}

/**
 * GET /audio/* - stimulus files under the audio root
 */
export async function audioRoutes(app: FastifyInstance, audioRoot: string): Promise<void> {
  app.get<{ Params: { "*": string } }>("/audio/*", async (request, reply) => {
    const notFound = () =>
      reply.status(404).send(buildErrorV1("NOT_FOUND", "Audio file not found", undefined, getRequestId(request)));

    const filePath = resolveAudioPath(audioRoot, request.params["*"]);
    if (!filePath) {
      return notFound();
    }

    let size: number;
    try {
      const info = await stat(filePath);
      if (!info.isFile()) {
        return notFound();
      }
      size = info.size;
    } catch {
      return notFound();
    }

    return reply
      .header("Content-Type", AUDIO_CONTENT_TYPES[extname(filePath).toLowerCase()])
      .header("Content-Length", size)
      .header("Cache-Control", "private, max-age=3600")
      .send(createReadStream(filePath));
  });
}
