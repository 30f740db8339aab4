/**
 * Tool Agents Tools
 *
 * Concrete tools wrapped by the agents, and the executor that invokes them.
 */

export { ToolExecutor, validatorFor, DEFAULT_TOOL_TIMEOUT_MS, type AnyTool, type ToolExecutorOptions } from "./executor";

// READ tools
export { repoSearchTool, type RepoSearchResult, type SearchMatch } from "./read/repo_search";

// ANALYSIS tools
export { regexExtractorTool, type RegexExtractorResult, type RegexMatch } from "./extract/regex_extractor";
export {
  todoExtractorTool,
  DEFAULT_MARKERS,
  DEFAULT_PRIORITY_KEYWORDS,
  type TodoExtractorResult,
  type TodoItem,
  type TodoPriority,
} from "./extract/todo_extractor";

import type { AnyTool } from "./executor";
import { repoSearchTool } from "./read/repo_search";
import { regexExtractorTool } from "./extract/regex_extractor";
import { todoExtractorTool } from "./extract/todo_extractor";

export const readTools: AnyTool[] = [repoSearchTool];

export const analysisTools: AnyTool[] = [regexExtractorTool, todoExtractorTool];

export const allTools: AnyTool[] = [...readTools, ...analysisTools];
