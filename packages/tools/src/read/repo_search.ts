/**
 * repo_search - Search a directory tree for text or regex matches
 */

import { fail, ok, type Tool, type ToolContext, type ToolResult } from "@tool-agents/types";
import { z } from "zod";
import { glob } from "glob";
import * as fs from "fs";
import * as path from "path";

const IGNORED_GLOBS = ["**/node_modules/**", "**/.git/**", "**/dist/**", "**/coverage/**"];
const MAX_FILE_BYTES = 1024 * 1024;
const PROGRESS_EVERY_FILES = 50;

const paramsSchema = z.object({
  root: z.string().min(1).describe("Directory to search"),
  query: z.string().min(1).describe("Text to find, or a regex when isRegex is set"),
  isRegex: z.boolean().default(false),
  filePattern: z.string().optional().describe("File name glob (e.g., '*.ts')"),
  maxResults: z.number().int().positive().max(1000).default(20),
});

type RepoSearchParams = z.infer<typeof paramsSchema>;

export interface SearchMatch {
  file: string;
  line: number;
  content: string;
}

export interface RepoSearchResult {
  matches: SearchMatch[];
  totalMatches: number;
  filesScanned: number;
  truncated: boolean;
}

async function listFiles(root: string, filePattern: string | undefined): Promise<string[]> {
  const files = await glob(filePattern ? `**/${filePattern}` : "**/*", {
    cwd: root,
    nodir: true,
    dot: true,
    ignore: IGNORED_GLOBS,
  });
  return files.map((file) => file.split(path.sep).join("/")).sort();
}

export const repoSearchTool: Tool<RepoSearchParams, RepoSearchResult> = {
  name: "repo_search",
  description: "Search a repository for text or regex matches, reporting file, line and content.",
  category: "READ_ONLY",
  paramsSchema,
  resultSchema: z.object({
    matches: z.array(
      z.object({
        file: z.string(),
        line: z.number(),
        content: z.string(),
      })
    ),
    totalMatches: z.number(),
    filesScanned: z.number(),
    truncated: z.boolean(),
  }),
  costHint: "moderate",

  async execute(params, ctx: ToolContext): Promise<ToolResult<RepoSearchResult>> {
    const root = path.resolve(params.root);

    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(root);
    } catch {
      return fail("path_not_found", `Path not found: ${params.root}`);
    }
    if (!stat.isDirectory()) {
      return fail("not_a_directory", `Path is not a directory: ${params.root}`);
    }

    let matcher: (line: string) => boolean;
    if (params.isRegex) {
      let regex: RegExp;
      try {
        regex = new RegExp(params.query);
      } catch (error) {
        return fail("invalid_pattern", error instanceof Error ? error.message : String(error));
      }
      matcher = (line) => regex.test(line);
    } else {
      matcher = (line) => line.includes(params.query);
    }

    const matches: SearchMatch[] = [];
    let totalMatches = 0;
    let filesScanned = 0;

    for (const relative of await listFiles(root, params.filePattern)) {
      if (ctx.isCancelled()) {
        return fail("cancelled", "Search cancelled", true);
      }

      const file = path.join(root, relative);
      const size = (await fs.promises.stat(file)).size;
      if (size > MAX_FILE_BYTES) {
        continue;
      }

      const text = await fs.promises.readFile(file, "utf-8");
      filesScanned++;
      if (filesScanned % PROGRESS_EVERY_FILES === 0) {
        ctx.reportProgress({ filesScanned, totalMatches });
      }
      if (text.includes("\0")) {
        continue; // binary
      }

      const lines = text.split("\n");
      for (let i = 0; i < lines.length; i++) {
        if (!matcher(lines[i])) continue;
        totalMatches++;
        if (matches.length < params.maxResults) {
          matches.push({ file: relative, line: i + 1, content: lines[i].trim().slice(0, 200) });
        }
      }
    }

    return ok({
      matches,
      totalMatches,
      filesScanned,
      truncated: totalMatches > matches.length,
    });
  },
};
