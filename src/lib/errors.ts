// Exceptional conditions only; "not found" outcomes are null or tagged unions.

/** OCR service unreachable or returned an error payload (per-image) */
export class OcrError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'OcrError';
    this.status = options?.status;
  }
}

/** Image bytes could not be decoded into pixels (per-image) */
export class ImageDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ImageDecodeError';
  }
}

/** Durable table storage failed on load or save (fatal for the run) */
export class TableStoreError extends Error {
  readonly key: string;

  constructor(key: string, message: string, options?: { cause?: unknown }) {
    super(`${key}: ${message}`, options);
    this.name = 'TableStoreError';
    this.key = key;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
