export class LayoutReconstructionError extends Error {
  code = "LAYOUT_RECONSTRUCTION_ERROR";
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = "LayoutReconstructionError";
  }
}

export class InputFileError extends Error {
  code = "INPUT_FILE_ERROR";
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = "InputFileError";
  }
}

export class ConfigError extends Error {
  code = "CONFIG_ERROR";
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = "ConfigError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
