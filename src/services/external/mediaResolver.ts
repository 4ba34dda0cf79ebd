/**
 * Video Resolution Service Client
 * Turns a share link into a direct media URL via the parser API.
 * Any failure here is terminal for the job: retrying will not make a link resolvable.
 */

import { z } from "zod";
import { buildParserSignature } from "../../utils/parserSignature.js";
import { errorText } from "../../utils/errorMessages.js";
import { ResolutionError } from "../../utils/errors.js";

export type MediaKind = "audio" | "video";

export interface ResolvedMedia {
  platform: string;
  mediaUrl: string;
  kind: MediaKind;
}

export type MediaResolver = (sourceUrl: string, signal?: AbortSignal) => Promise<ResolvedMedia>;

export interface MediaResolverOptions {
  baseUrl: string;
  timeoutMs?: number;
}

const parserResponseSchema = z.object({
  retcode: z.number(),
  retdesc: z.string().default(""),
  succ: z.boolean(),
  data: z
    .object({
      platform: z.string().default(""),
      video_url: z.string().default(""),
      audio_url: z.string().default(""),
    })
    .nullish(),
});

const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;

export function createMediaResolver({ baseUrl, timeoutMs = DEFAULT_TIMEOUT_MS }: MediaResolverOptions): MediaResolver {
  if (!baseUrl.trim()) {
    throw new Error("PARSER_API_URL is required");
  }
  const endpoint = new URL("api/parse", baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`).toString();

  return async (sourceUrl, signal) => {
    const timeout = AbortSignal.timeout(timeoutMs);
    let response: Response;
    try {
      response = await fetch(endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...buildParserSignature(),
        },
        body: JSON.stringify({ text: sourceUrl }),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw new ResolutionError(`parser request failed: ${errorText(error)}`);
    }

    if (response.status !== 200) {
      throw new ResolutionError(`parser http status ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new ResolutionError("parser returned invalid json");
    }

    const parsed = parserResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ResolutionError("parser returned an unexpected payload");
    }
    const { retcode, retdesc, succ, data } = parsed.data;
    if (!succ || retcode !== 200) {
      throw new ResolutionError(`parser error: ${retcode} ${retdesc}`.trim());
    }

    const audioUrl = data?.audio_url.trim() ?? "";
    const videoUrl = data?.video_url.trim() ?? "";
    if (!audioUrl && !videoUrl) {
      throw new ResolutionError("parser returned no media url");
    }

    return {
      platform: data?.platform ?? "",
      mediaUrl: audioUrl || videoUrl,
      kind: audioUrl ? "audio" : "video",
    };
  };
}
