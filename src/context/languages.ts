import path from "node:path";
import type { LanguageId } from "../types.js";

const EXTENSION_LANGUAGES: Record<string, LanguageId> = {
  ".ts": "typescript",
  ".tsx": "typescript",
  ".mts": "typescript",
  ".cts": "typescript",
  ".js": "javascript",
  ".jsx": "javascript",
  ".mjs": "javascript",
  ".cjs": "javascript",
  ".py": "python",
  ".pyw": "python",
  ".java": "java",
  ".go": "go",
  ".rb": "ruby",
  ".cs": "csharp",
  ".c": "cpp",
  ".h": "cpp",
  ".cc": "cpp",
  ".cpp": "cpp",
  ".cxx": "cpp",
  ".hpp": "cpp",
  ".php": "php"
};

export function languageForPath(filePath: string): LanguageId {
  return EXTENSION_LANGUAGES[path.extname(filePath).toLowerCase()] ?? "unknown";
}
