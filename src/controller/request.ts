import { z } from "zod";
import type { RankingRequest, StimulusOption, TrialTiming } from "../types.js";

const optionSchema = z.object({
  id: z.number().int(),
  stimulus: z.unknown(),
});

const requestSchema = z.object({
  options: z
    .array(optionSchema)
    .min(1, "option set is empty")
    .refine(
      (options) => new Set(options.map((option) => option.id)).size === options.length,
      "option ids must be unique",
    ),
  timing: z
    .object({
      previewMs: z.number().int().positive().max(600_000).optional(),
      flashMs: z.number().int().positive().max(60_000).optional(),
    })
    .optional(),
});

export type ParsedRankingRequest<S> =
  | { ok: true; options: StimulusOption<S>[]; timing: TrialTiming }
  | { ok: false; reason: string };

/** Requests may come straight off the wire, so the whole shape is checked, not only the ids. */
export function parseRankingRequest<S>(
  request: RankingRequest<S>,
  defaults: TrialTiming,
): ParsedRankingRequest<S> {
  const parsed = requestSchema.safeParse(request);
  if (!parsed.success) {
    return { ok: false, reason: formatIssues(parsed.error) };
  }
  const { timing } = parsed.data;
  return {
    ok: true,
    options: [...request.options],
    timing: {
      previewMs: timing?.previewMs ?? defaults.previewMs,
      flashMs: timing?.flashMs ?? defaults.flashMs,
    },
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
