// lib/batch/processDirectory.ts
import { stat } from "fs/promises";
import path from "path";
import { glob } from "glob";
import { DEFAULT_OUTPUT_SUFFIX } from "@/lib/config/passFail";
import { getErrorMessage, isErrnoException } from "@/lib/utils/error";
import { getOutputPath, processLogFile, type LogFileOptions, type LogFileResult } from "./logFiles";

export interface ProcessDirectoryOptions extends LogFileOptions {
  recursive?: boolean;
  /** Defaults to writing outputs beside their inputs. */
  outputDir?: string;
  outputSuffix?: string;
}

export interface DirectoryStats {
  filesChecked: number;
  filesProcessed: number;
  filesSkipped: number;
  totalInstances: number;
  totalPassed: number;
  totalFailed: number;
  totalUnchanged: number;
  results: LogFileResult[];
  errors: Array<{ inputPath: string; error: string }>;
}

/**
 * Files to consider in a directory. Outputs from earlier runs
 * ("<stem>_processed<ext>") are left out so a rerun does not stack suffixes.
 */
export async function listLogFiles(
  directory: string,
  options: { recursive?: boolean; outputSuffix?: string } = {}
): Promise<string[]> {
  const { recursive = false, outputSuffix = DEFAULT_OUTPUT_SUFFIX } = options;
  const files = await glob(recursive ? "**/*" : "*", {
    cwd: directory,
    nodir: true,
    dot: false,
    absolute: true,
  });

  return files
    .filter((file) => !path.parse(file).name.endsWith(outputSuffix))
    .sort();
}

/**
 * Resolve PASS/FAIL markers in every log file under a directory.
 *
 * Each file is scanned on its own (fresh parameter history). A failure on one
 * file is recorded in `errors` and the batch carries on.
 */
export async function processDirectory(
  directory: string,
  options: ProcessDirectoryOptions = {}
): Promise<DirectoryStats> {
  const { recursive = false, outputDir, outputSuffix = DEFAULT_OUTPUT_SUFFIX } = options;

  const info = await stat(directory).catch((error: unknown) => {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new Error(`Directory not found: ${directory}`);
    }
    throw error;
  });
  if (!info.isDirectory()) {
    throw new Error(`Not a directory: ${directory}`);
  }

  const baseDir = path.resolve(directory);
  const files = await listLogFiles(baseDir, { recursive, outputSuffix });

  const stats: DirectoryStats = {
    filesChecked: files.length,
    filesProcessed: 0,
    filesSkipped: 0,
    totalInstances: 0,
    totalPassed: 0,
    totalFailed: 0,
    totalUnchanged: 0,
    results: [],
    errors: [],
  };

  console.log("[PassFail Batch] Scanning directory:", {
    directory: baseDir,
    recursive,
    outputDir: outputDir ?? null,
    fileCount: files.length,
  });

  for (const inputPath of files) {
    const outputPath = getOutputPath(inputPath, {
      outputDir,
      baseDir: recursive ? baseDir : undefined,
      suffix: outputSuffix,
    });

    try {
      const result = await processLogFile(inputPath, outputPath, options);
      stats.results.push(result);

      if (result.status === "SKIPPED") {
        stats.filesSkipped += 1;
        continue;
      }

      stats.filesProcessed += 1;
      stats.totalInstances += result.stats.total;
      stats.totalPassed += result.stats.passed;
      stats.totalFailed += result.stats.failed;
      stats.totalUnchanged += result.stats.unchanged;
    } catch (error) {
      console.error("[PassFail Batch] Failed to process file:", {
        inputPath,
        error: getErrorMessage(error),
      });
      stats.errors.push({ inputPath, error: getErrorMessage(error) });
    }
  }

  return stats;
}
