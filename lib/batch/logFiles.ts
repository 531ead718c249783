// lib/batch/logFiles.ts
import { mkdir, readFile, stat, writeFile } from "fs/promises";
import path from "path";
import { DEFAULT_OUTPUT_SUFFIX, type LogEncoding } from "@/lib/config/passFail";
import { hasPendingMarkers, scanDocument } from "@/lib/passFail/documentScanner";
import { joinLines, splitLines } from "@/lib/passFail/lines";
import { DEFAULT_INTERPRETER_SETTINGS } from "@/lib/passFail/markers";
import type { InterpreterSettings, ScanStats } from "@/lib/passFail/types";
import { isErrnoException } from "@/lib/utils/error";

export interface LogFileOptions {
  settings?: InterpreterSettings;
  encoding?: LogEncoding;
}

export type LogFileResult =
  | { status: "SKIPPED"; inputPath: string }
  | { status: "PROCESSED"; inputPath: string; outputPath: string; stats: ScanStats };

/**
 * Output path for a processed log: "<stem><suffix><ext>".
 *
 * Without outputDir the file lands beside the input. With outputDir and a
 * baseDir (recursive directory runs), the input's sub-path below baseDir is
 * kept under outputDir.
 */
export function getOutputPath(
  inputPath: string,
  options: { outputDir?: string; baseDir?: string; suffix?: string } = {}
): string {
  const { outputDir, baseDir, suffix = DEFAULT_OUTPUT_SUFFIX } = options;
  const parsed = path.parse(inputPath);
  const fileName = `${parsed.name}${suffix}${parsed.ext}`;

  if (!outputDir) {
    return path.join(parsed.dir, fileName);
  }
  const subDir = baseDir ? path.relative(baseDir, parsed.dir) : "";
  return path.join(outputDir, subDir, fileName);
}

export async function readLogLines(filePath: string, encoding: LogEncoding = "latin1"): Promise<string[]> {
  try {
    const text = await readFile(filePath, { encoding });
    return splitLines(text);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new Error(`Input file not found: ${filePath}`);
    }
    throw error;
  }
}

export async function writeLogLines(
  filePath: string,
  lines: readonly string[],
  encoding: LogEncoding = "latin1"
): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, joinLines(lines), { encoding });
}

export async function fileHasPendingMarkers(
  filePath: string,
  options: LogFileOptions = {}
): Promise<boolean> {
  const lines = await readLogLines(filePath, options.encoding);
  return hasPendingMarkers(lines, options.settings);
}

/**
 * Resolve every PASS/FAIL marker in one log file.
 *
 * Files without markers are skipped and no output file is written.
 */
export async function processLogFile(
  inputPath: string,
  outputPath: string,
  options: LogFileOptions = {}
): Promise<LogFileResult> {
  const { settings = DEFAULT_INTERPRETER_SETTINGS, encoding = "latin1" } = options;

  const info = await stat(inputPath).catch((error: unknown) => {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new Error(`Input file not found: ${inputPath}`);
    }
    throw error;
  });
  if (!info.isFile()) {
    throw new Error(`Not a file: ${inputPath}`);
  }

  const lines = await readLogLines(inputPath, encoding);
  if (!hasPendingMarkers(lines, settings)) {
    return { status: "SKIPPED", inputPath };
  }

  const result = scanDocument(lines, settings);
  await writeLogLines(outputPath, result.lines, encoding);

  console.log("[PassFail File] Processed log:", {
    inputPath,
    outputPath,
    total: result.stats.total,
    passed: result.stats.passed,
    failed: result.stats.failed,
    unchanged: result.stats.unchanged,
  });

  return { status: "PROCESSED", inputPath, outputPath, stats: result.stats };
}
