/**
 * Filler error taxonomy.
 *
 * Fatal errors (load, unsupported format, config) abort before any record
 * is processed. Per-record errors (write, export, logo) are caught by the
 * batch loop and attributed to the failing record.
 */

export type FillerErrorCode =
  | "LOAD_ERROR"
  | "UNSUPPORTED_FORMAT"
  | "CONFIG_ERROR"
  | "OUTPUT_WRITE_ERROR"
  | "EXPORT_ERROR"
  | "LOGO_ERROR";

export class FillerError extends Error {
  constructor(
    public readonly code: FillerErrorCode,
    message: string,
    public readonly path?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "FillerError";
  }
}

export class LoadError extends FillerError {
  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super("LOAD_ERROR", message, path, options);
    this.name = "LoadError";
  }
}

export class UnsupportedFormatError extends FillerError {
  constructor(public readonly extension: string, path?: string) {
    super(
      "UNSUPPORTED_FORMAT",
      `Unsupported data format "${extension || "(none)"}". Use .xlsx, .xls, .csv, .json or .jsonl`,
      path,
    );
    this.name = "UnsupportedFormatError";
  }
}

export class ConfigError extends FillerError {
  constructor(message: string) {
    super("CONFIG_ERROR", message);
    this.name = "ConfigError";
  }
}

export class OutputWriteError extends FillerError {
  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super("OUTPUT_WRITE_ERROR", message, path, options);
    this.name = "OutputWriteError";
  }
}

export class ExportError extends FillerError {
  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super("EXPORT_ERROR", message, path, options);
    this.name = "ExportError";
  }
}

export class LogoError extends FillerError {
  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super("LOGO_ERROR", message, path, options);
    this.name = "LogoError";
  }
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
