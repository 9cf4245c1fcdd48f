import path from "node:path";
import { open, readFile, stat } from "node:fs/promises";
import fg from "fast-glob";
import ignore from "ignore";

import { noopLogger, type Logger } from "../logging/logger.js";

export interface DiscoverOptions {
  root: string;
  includeExtensions: string[];
  exclude: string[];
  maxFileSizeBytes: number;
  logger?: Logger;
}

export type DiscoveredFile = {
  absolutePath: string;
  // Posix-style, relative to the root.
  relativePath: string;
  size: number;
  mtimeMs: number;
};

function errorCode(err: unknown): string | null {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") return err.code;
  return null;
}

async function loadGitignore(root: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await readFile(path.join(root, ".gitignore"), "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") return [];
    throw err;
  }
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("#"));
}

async function isTextFile(filePath: string): Promise<boolean> {
  const handle = await open(filePath, "r");
  try {
    const sample = Buffer.alloc(4000);
    const { bytesRead } = await handle.read(sample, 0, sample.length, 0);
    return !sample.subarray(0, bytesRead).includes(0);
  } finally {
    await handle.close();
  }
}

/**
 * Lists indexable source files under `root`, honouring the configured
 * excludes and the root `.gitignore`. Results are sorted by relative path.
 */
export async function discoverFiles(options: DiscoverOptions): Promise<DiscoveredFile[]> {
  const logger = options.logger ?? noopLogger;
  const ig = ignore();
  ig.add(options.exclude);
  ig.add(await loadGitignore(options.root));
  const extensions = new Set(options.includeExtensions.map((ext) => ext.toLowerCase()));

  const entries = await fg(["**/*"], {
    cwd: options.root,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false
  });

  const discovered: DiscoveredFile[] = [];
  for (const relativePath of entries.sort()) {
    if (ig.ignores(relativePath)) continue;
    const ext = path.extname(relativePath).toLowerCase();
    if (extensions.size && !extensions.has(ext)) continue;

    const absolutePath = path.join(options.root, relativePath);
    try {
      const info = await stat(absolutePath);
      if (info.size > options.maxFileSizeBytes) {
        logger.debug("Skipping large file", { file: relativePath, size: info.size });
        continue;
      }
      if (!(await isTextFile(absolutePath))) continue;
      discovered.push({ absolutePath, relativePath, size: info.size, mtimeMs: info.mtimeMs });
    } catch (err) {
      // Files can vanish between the glob and the read.
      if (errorCode(err) !== "ENOENT") throw err;
      logger.debug("File disappeared during discovery", { file: relativePath });
    }
  }

  return discovered;
}
