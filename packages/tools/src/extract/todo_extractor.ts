/**
 * todo_extractor - Find TODO/FIXME style markers in code comments
 */

import { ok, type Tool, type ToolResult } from "@tool-agents/types";
import { z } from "zod";

export const DEFAULT_MARKERS = ["TODO", "FIXME", "HACK", "BUG", "NOTE", "OPTIMIZE"];
export const DEFAULT_PRIORITY_KEYWORDS = ["URGENT", "CRITICAL", "IMPORTANT", "ASAP"];

const paramsSchema = z.object({
  code: z.string().max(100_000).describe("Source code to scan"),
  patterns: z.array(z.string().min(1)).min(1).default(DEFAULT_MARKERS),
  priorityKeywords: z.array(z.string().min(1)).default(DEFAULT_PRIORITY_KEYWORDS),
});

type TodoExtractorParams = z.infer<typeof paramsSchema>;

export type TodoPriority = "high" | "medium" | "low";

export interface TodoItem {
  type: string;
  line: number;
  text: string;
  author?: string;
  priority: TodoPriority;
}

export interface TodoExtractorResult {
  items: TodoItem[];
  counts: Record<string, number>;
  total: number;
}

const MEDIUM_MARKERS = new Set(["FIXME", "BUG"]);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function buildMarkerRegExp(markers: string[]): RegExp {
  const alternatives = markers.map(escapeRegExp).join("|");
  // comment opener (a bare * only as a block continuation), marker, optional (author), optional colon, text, optional closer
  return new RegExp(
    `(?:\\/\\/|#|\\/\\*|^\\s*\\*|--|<!--)\\s*(${alternatives})\\b(?:\\(([^)]*)\\))?:?\\s*(.*?)\\s*(?:\\*\\/|-->)?$`
  );
}

function classify(type: string, text: string, keywords: string[]): TodoPriority {
  const upper = text.toUpperCase();
  if (keywords.some((k) => new RegExp(`\\b${escapeRegExp(k.toUpperCase())}\\b`).test(upper))) {
    return "high";
  }
  return MEDIUM_MARKERS.has(type) ? "medium" : "low";
}

export const todoExtractorTool: Tool<TodoExtractorParams, TodoExtractorResult> = {
  name: "todo_extractor",
  description: "Scan code comments for TODO, FIXME and other deferred-work markers.",
  category: "ANALYSIS",
  paramsSchema,
  resultSchema: z.object({
    items: z.array(
      z.object({
        type: z.string(),
        line: z.number(),
        text: z.string(),
        author: z.string().optional(),
        priority: z.enum(["high", "medium", "low"]),
      })
    ),
    counts: z.record(z.number()),
    total: z.number(),
  }),
  costHint: "cheap",

  async execute(params): Promise<ToolResult<TodoExtractorResult>> {
    const regex = buildMarkerRegExp(params.patterns);
    const items: TodoItem[] = [];
    const counts: Record<string, number> = {};

    params.code.split("\n").forEach((line, i) => {
      const match = regex.exec(line);
      if (!match) return;

      const [, type, author, text] = match;
      const item: TodoItem = {
        type,
        line: i + 1,
        text,
        priority: classify(type, text, params.priorityKeywords),
      };
      if (author && author.trim()) {
        item.author = author.trim();
      }

      items.push(item);
      counts[type] = (counts[type] ?? 0) + 1;
    });

    return ok({ items, counts, total: items.length });
  },
};
