import { constants } from "node:fs";
import { access, readFile } from "node:fs/promises";
import { z } from "zod";
import { InputFileError, describeError } from "./errors.ts";

const recordsFileSchema = z.union([
  z.array(z.unknown()),
  z.object({ chunks: z.array(z.unknown()) }).transform((response) => response.chunks),
]);

export async function assertReadableFile(filePath: string): Promise<void> {
  try {
    await access(filePath, constants.R_OK);
  } catch {
    throw new InputFileError(`Cannot read input file: ${filePath}`);
  }
}

/** Reads OCR records from a JSON file holding either a bare array or a `{ chunks }` response. */
export async function readRecordsFile(filePath: string): Promise<unknown[]> {
  await assertReadableFile(filePath);
  const content = await readFile(filePath, "utf8");
  return parseRecordsJson(content, filePath);
}

export function parseRecordsJson(content: string, source: string): unknown[] {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error: unknown) {
    throw new InputFileError(`Invalid JSON in ${source}: ${describeError(error)}`, error);
  }

  const parsed = recordsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new InputFileError(
      `Expected an array of records or an object with a "chunks" array in ${source}`,
      parsed.error.issues,
    );
  }
  return parsed.data;
}
