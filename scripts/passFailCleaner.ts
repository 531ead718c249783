/**
 * Pass/fail cleaner CLI.
 *
 * Usage:
 *   Single file:  npm run clean-logs -- <input_file> [output_file]
 *   Directory:    npm run clean-logs -- <directory> [output_directory]
 *   Recursive:    npm run clean-logs -- -r <directory> [output_directory]
 *
 * Only writes output files for inputs that contain PASS/FAIL markers.
 */

import { config } from "dotenv";
import { stat } from "fs/promises";
import path from "path";
import { getInterpreterSettings, getLogEncoding, getOutputSuffix } from "@/lib/config/passFail";
import { getOutputPath, processLogFile } from "@/lib/batch/logFiles";
import { processDirectory } from "@/lib/batch/processDirectory";
import { getErrorMessage, isErrnoException } from "@/lib/utils/error";

// Load .env.local first, then .env
config({ path: path.resolve(process.cwd(), ".env.local") });
config({ path: path.resolve(process.cwd(), ".env") });

const RULE = "=".repeat(60);

function printUsage(): void {
  console.log("Usage:");
  console.log("  Single file:  npm run clean-logs -- <input_file> [output_file]");
  console.log("  Directory:    npm run clean-logs -- <directory> [output_directory]");
  console.log("  Recursive:    npm run clean-logs -- -r <directory> [output_directory]");
  console.log("\nResolves PASS/FAIL markers in test result files against their S/B criteria.");
  console.log("Only creates output files for inputs that contain PASS/FAIL markers.");
}

function parseArgs(argv: string[]): {
  recursive: boolean;
  inputPath: string;
  outputPath: string | null;
} | null {
  const recursive = argv[0] === "-r";
  const rest = recursive ? argv.slice(1) : argv;
  if (rest.length === 0) return null;
  return { recursive, inputPath: rest[0], outputPath: rest[1] ?? null };
}

async function runFile(inputPath: string, outputPath: string | null): Promise<void> {
  const settings = getInterpreterSettings();
  const encoding = getLogEncoding();
  const outputFile = outputPath ?? getOutputPath(inputPath, { suffix: getOutputSuffix() });

  console.log(`Processing: ${inputPath}`);
  console.log(`Output to: ${outputFile}`);
  console.log("-".repeat(60));

  const result = await processLogFile(inputPath, outputFile, { settings, encoding });
  if (result.status === "SKIPPED") {
    console.log(`No PASS/FAIL conditions found in ${inputPath}`);
    console.log("No output file created.");
    return;
  }

  const { stats } = result;
  console.log("\nProcessing complete!");
  console.log(`Total PASS/FAIL instances found: ${stats.total}`);
  console.log(`  - Resolved as PASS: ${stats.passed}`);
  console.log(`  - Resolved as FAIL: ${stats.failed}`);
  if (stats.failed > 0) {
    console.log(`    Line numbers: ${stats.failedLineNumbers.join(", ")}`);
  }
  console.log(`  - Left unchanged: ${stats.unchanged}`);
  if (stats.unchanged > 0) {
    console.log(`    Line numbers: ${stats.unchangedLineNumbers.join(", ")}`);
  }
  console.log(`\nOutput written to: ${outputFile}`);
}

async function runDirectory(directory: string, outputDir: string | null, recursive: boolean): Promise<void> {
  console.log(`Processing directory: ${directory}`);
  if (recursive) console.log("Mode: Recursive");
  if (outputDir) console.log(`Output directory: ${outputDir}`);
  console.log(RULE);

  const stats = await processDirectory(directory, {
    recursive,
    outputDir: outputDir ?? undefined,
    outputSuffix: getOutputSuffix(),
    settings: getInterpreterSettings(),
    encoding: getLogEncoding(),
  });

  for (const result of stats.results) {
    if (result.status !== "PROCESSED") continue;
    const { stats: file } = result;
    console.log(`\n${result.inputPath} -> ${result.outputPath}`);
    console.log(`  ✓ ${file.total} instances: ${file.passed} PASS, ${file.failed} FAIL, ${file.unchanged} unchanged`);
    if (file.failed > 0) console.log(`    FAIL at lines: ${file.failedLineNumbers.join(", ")}`);
    if (file.unchanged > 0) console.log(`    Unchanged at lines: ${file.unchangedLineNumbers.join(", ")}`);
  }
  for (const failure of stats.errors) {
    console.error(`  ✗ ${failure.inputPath}: ${failure.error}`);
  }

  console.log(`\n${RULE}`);
  console.log("Processing complete!");
  console.log(`Files checked: ${stats.filesChecked}`);
  console.log(`Files processed: ${stats.filesProcessed}`);
  console.log(`Files skipped (no PASS/FAIL): ${stats.filesSkipped}`);
  if (stats.filesProcessed > 0) {
    console.log(`\nTotal PASS/FAIL instances: ${stats.totalInstances}`);
    console.log(`  - Resolved as PASS: ${stats.totalPassed}`);
    console.log(`  - Resolved as FAIL: ${stats.totalFailed}`);
    console.log(`  - Left unchanged: ${stats.totalUnchanged}`);
  }
  if (stats.errors.length > 0) {
    process.exitCode = 1;
  }
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    printUsage();
    process.exitCode = 1;
    return;
  }

  const info = await stat(args.inputPath).catch((error: unknown) => {
    if (isErrnoException(error) && error.code === "ENOENT") return null;
    throw error;
  });
  if (!info) {
    console.error(`Error: Path not found: ${args.inputPath}`);
    process.exitCode = 1;
    return;
  }

  if (info.isDirectory()) {
    await runDirectory(args.inputPath, args.outputPath, args.recursive);
  } else {
    await runFile(args.inputPath, args.outputPath);
  }
}

main().catch((error: unknown) => {
  console.error(`Error: ${getErrorMessage(error)}`);
  process.exitCode = 1;
});
