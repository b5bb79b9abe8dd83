export type SiteErrorKind =
  | "parse"
  | "missing-layout"
  | "template"
  | "io"
  | "config"
  | "output-conflict";

/**
 * Base class for every failure the pipeline reports. `filePath` names the
 * document, layout or config file the failure belongs to.
 */
export abstract class SiteError extends Error {
  abstract readonly kind: SiteErrorKind;
  readonly filePath: string | undefined;

  constructor(message: string, filePath?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.filePath = filePath;
  }
}

/** Malformed document metadata */
export class ParseError extends SiteError {
  readonly kind = "parse";
}

export class MissingLayoutError extends SiteError {
  readonly kind = "missing-layout";
  readonly layout: string;

  constructor(layout: string, filePath?: string) {
    super(`layout "${layout}" does not exist`, filePath);
    this.layout = layout;
  }
}

export class TemplateError extends SiteError {
  readonly kind = "template";
  readonly line: number | undefined;

  constructor(message: string, filePath?: string, line?: number) {
    super(line === undefined ? message : `${message} (line ${line})`, filePath);
    this.line = line;
  }
}

export class IOError extends SiteError {
  readonly kind = "io";
}

export class ConfigError extends SiteError {
  readonly kind = "config";
}

export class OutputConflictError extends SiteError {
  readonly kind = "output-conflict";
  readonly outputPath: string;

  constructor(outputPath: string, filePath: string, winner: string) {
    super(`output path "${outputPath}" is already produced by ${winner}`, filePath);
    this.outputPath = outputPath;
  }
}

/**
 * Extract a human-readable error message from an unknown error value.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Anything thrown by the filesystem layer becomes an IOError for `filePath`. */
export function toSiteError(error: unknown, filePath: string): SiteError {
  if (error instanceof SiteError) return error;
  return new IOError(getErrorMessage(error), filePath, { cause: error });
}
