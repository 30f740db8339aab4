/**
 * regex_extractor - Extract regex matches from text with positions
 */

import { fail, ok, type Tool, type ToolResult } from "@tool-agents/types";
import { z } from "zod";

const paramsSchema = z.object({
  content: z.string().max(1_000_000).describe("Text to scan"),
  pattern: z.string().min(1).describe("JavaScript regular expression source"),
  flags: z
    .string()
    .regex(/^[imsuy]*$/, "Only i, m, s, u and y flags are allowed")
    .default(""),
  maxMatches: z.number().int().positive().max(10_000).default(100),
});

type RegexExtractorParams = z.infer<typeof paramsSchema>;

export interface RegexMatch {
  match: string;
  index: number;
  line: number;
  groups: Array<string | null>;
}

export interface RegexExtractorResult {
  matches: RegexMatch[];
  totalMatches: number;
  truncated: boolean;
}

/**
 * Line numbers for ascending indices, counting newlines only once
 */
function lineCounter(content: string): (index: number) => number {
  let position = 0;
  let line = 1;
  return (index) => {
    for (; position < index; position++) {
      if (content.charCodeAt(position) === 10) line++;
    }
    return line;
  };
}

export const regexExtractorTool: Tool<RegexExtractorParams, RegexExtractorResult> = {
  name: "regex_extractor",
  description: "Extract every match of a regular expression from text, with line numbers and capture groups.",
  category: "ANALYSIS",
  paramsSchema,
  resultSchema: z.object({
    matches: z.array(
      z.object({
        match: z.string(),
        index: z.number(),
        line: z.number(),
        groups: z.array(z.string().nullable()),
      })
    ),
    totalMatches: z.number(),
    truncated: z.boolean(),
  }),
  costHint: "cheap",

  async execute(params): Promise<ToolResult<RegexExtractorResult>> {
    let regex: RegExp;
    try {
      regex = new RegExp(params.pattern, `g${params.flags}`);
    } catch (error) {
      return fail("invalid_pattern", error instanceof Error ? error.message : String(error));
    }

    const matches: RegexMatch[] = [];
    const lineOf = lineCounter(params.content);
    let totalMatches = 0;

    for (const m of params.content.matchAll(regex)) {
      totalMatches++;
      if (matches.length >= params.maxMatches) continue;

      const index = m.index ?? 0;
      matches.push({
        match: m[0],
        index,
        line: lineOf(index),
        groups: m.slice(1).map((g) => g ?? null),
      });
    }

    return ok({ matches, totalMatches, truncated: totalMatches > matches.length });
  },
};
