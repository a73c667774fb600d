export type CodesErrorCode =
  | "TRANSPORT"
  | "STRUCTURE"
  | "CATEGORY_SEQUENCE"
  | "UNKNOWN_CATEGORY"
  | "STORAGE_CONNECTION"
  | "PERSISTENCE"
  | "NOT_FOUND";

export class CodesError extends Error {
  readonly code: CodesErrorCode;

  constructor(code: CodesErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class TransportError extends CodesError {
  readonly url: string;
  readonly statusCode?: number;

  constructor(url: string, message: string, options: { statusCode?: number; cause?: unknown } = {}) {
    super("TRANSPORT", message, { cause: options.cause });
    this.url = url;
    this.statusCode = options.statusCode;
  }
}

export class StructuralParseError extends CodesError {
  constructor(message: string) {
    super("STRUCTURE", message);
  }
}

export class CategorySequenceError extends CodesError {
  constructor(source: string, rowIndex: number) {
    super("CATEGORY_SEQUENCE", `Data row ${rowIndex} in ${source} appears before any category header`);
  }
}

export class UnknownCategoryError extends CodesError {
  readonly category: string;

  constructor(category: string) {
    super("UNKNOWN_CATEGORY", `Cannot find category: ${category || "(empty)"}`);
    this.category = category;
  }
}

export class StorageConnectionError extends CodesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORAGE_CONNECTION", message, options);
  }
}

export class PersistenceError extends CodesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PERSISTENCE", message, options);
  }
}

export class CodesNotFoundError extends CodesError {
  constructor(query: string) {
    super("NOT_FOUND", `No codes found for ${query}`);
  }
}

export const errorMessage = (error: unknown, fallback = "Unknown error") =>
  error instanceof Error ? error.message : typeof error === "string" ? error : fallback;
