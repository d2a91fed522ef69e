export type CatalogErrorKind = "input" | "validation" | "metadata" | "series_not_found" | "chapter_not_found" | "page_not_found" | "conflict";

export class CatalogError extends Error {
  public readonly kind: CatalogErrorKind;
  public readonly exitCode: number;

  constructor(message: string, kind: CatalogErrorKind = "input", exitCode = 2, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.exitCode = exitCode;
  }
}

export class ValidationError extends CatalogError {
  constructor(message: string) {
    super(`Validation error: ${message}`, "validation", 2);
  }
}

export class MetadataError extends CatalogError {
  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? `Metadata error: ${message}` : `Metadata error: ${message}. ${describeCause(cause)}`, "metadata", 1, { cause });
  }
}

export class SeriesNotFoundError extends CatalogError {
  constructor(message: string) {
    super(`Series not found: ${message}`, "series_not_found", 3);
  }
}

export class ChapterNotFoundError extends CatalogError {
  constructor(message: string) {
    super(`Chapter not found: ${message}`, "chapter_not_found", 3);
  }
}

export class PageNotFoundError extends CatalogError {
  constructor(message: string) {
    super(`Page not found: ${message}`, "page_not_found", 3);
  }
}

export class ConflictError extends CatalogError {
  constructor(message: string) {
    super(`Conflict: ${message}`, "conflict", 4);
  }
}

export function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
