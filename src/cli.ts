#!/usr/bin/env node

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { Command, InvalidArgumentError } from "commander";
import { config } from "./config.ts";
import { readRecordsFile } from "./file-access.ts";
import { analyzeBoxHeights, suggestCalibrationFactor } from "./font-calibration.ts";
import { classifyFragments, summarizeTextTypes } from "./font-size.ts";
import { parseFragments } from "./fragment-parse.ts";
import { TEXT_TYPES } from "./layout-types.ts";
import { extractRecordsFromPdf } from "./pdf-extract.ts";
import { reconstructLayout } from "./reading-order.ts";
import { extractStructureMetadata, toStructureRecord } from "./structure-metadata.ts";

const program = new Command();

program
  .name("layout-reconstruct")
  .description("Rebuild reading order and font sizes from OCR text fragments")
  .showHelpAfterError();

program.action(() => {
  program.outputHelp();
});

program
  .command("reconstruct")
  .description("Write the reading-order text of an OCR records file")
  .argument("<recordsPath>", "Path to a JSON file of OCR records")
  .option("-o, --output <path>", "Write the text to a file instead of stdout")
  .action(async (recordsPath: string, options: { output?: string }) => {
    const records = await readRecordsFile(resolve(recordsPath));
    const result = reconstructLayout(records);
    if (!result.ok) console.error(`Warning: ${result.error.message}`);

    if (options.output) {
      const outputPath = resolve(options.output);
      await writeOutputFile(outputPath, result.text);
      console.log(`Generated text file at ${outputPath}`);
      return;
    }
    process.stdout.write(`${result.text}\n`);
  });

program
  .command("classify")
  .description("Print the estimated font size and text type of every fragment")
  .argument("<recordsPath>", "Path to a JSON file of OCR records")
  .option("--calibration-factor <factor>", "Normalized height to points multiplier", parsePositiveNumber)
  .action(async (recordsPath: string, options: { calibrationFactor?: number }) => {
    const fragments = parseFragments(await readRecordsFile(resolve(recordsPath)));
    const classified = classifyFragments(fragments, {
      ...config.fontSize,
      calibrationFactor: options.calibrationFactor ?? config.fontSize.calibrationFactor,
    });

    classified.forEach((entry, index) => {
      console.log(`${entry.fontSize.toFixed(1)}pt ${entry.textType} ${fragments[index].text}`);
    });

    const distribution = summarizeTextTypes(classified);
    console.log("");
    for (const textType of TEXT_TYPES) {
      const share = distribution[textType];
      console.log(`${textType}: ${share.count} (${share.percentage.toFixed(1)}%)`);
    }
  });

program
  .command("structure")
  .description("Print page and column counts as JSON")
  .argument("<recordsPath>", "Path to a JSON file of OCR records")
  .action(async (recordsPath: string) => {
    const fragments = parseFragments(await readRecordsFile(resolve(recordsPath)));
    const structure = toStructureRecord(extractStructureMetadata(fragments));
    console.log(JSON.stringify(structure, null, 2));
  });

program
  .command("calibrate")
  .description("Suggest a calibration factor from the document's box heights")
  .argument("<recordsPath>", "Path to a JSON file of OCR records")
  .option("--body-size <points>", "Expected body text size in points", parsePositiveNumber)
  .action(async (recordsPath: string, options: { bodySize?: number }) => {
    const records = await readRecordsFile(resolve(recordsPath));
    const stats = analyzeBoxHeights(records);
    if (stats) console.log(JSON.stringify(stats, null, 2));
    const factor = suggestCalibrationFactor(records, options.bodySize);
    console.log(`Suggested calibration factor: ${factor.toFixed(1)}`);
  });

program
  .command("extract")
  .description("Build OCR records from the text layer of a PDF")
  .argument("<pdfPath>", "Path to input PDF file")
  .option("-o, --output <path>", "Write the records to a file instead of stdout")
  .action(async (pdfPath: string, options: { output?: string }) => {
    const records = await extractRecordsFromPdf(resolve(pdfPath));
    const json = JSON.stringify(records, null, 2);

    if (options.output) {
      const outputPath = resolve(options.output);
      await writeOutputFile(outputPath, json);
      console.log(`Extracted ${records.length} record(s) to ${outputPath}`);
      return;
    }
    process.stdout.write(`${json}\n`);
  });

async function writeOutputFile(outputPath: string, content: string): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, content, "utf8");
}

function parsePositiveNumber(value: string): number {
  const parsed = Number.parseFloat(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive number.");
  }
  return parsed;
}

void program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
