// src/errors.ts

/** The report PDF could not be downloaded or the response was not a PDF */
export class DocumentFetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = "DocumentFetchError";
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/** One-line text for any thrown value */
export function normalizeErrorText(error: unknown): string {
  if (error instanceof Error) {
    return error.message.replace(/\s+/g, " ").trim() || error.name;
  }
  if (typeof error === "string") return error.replace(/\s+/g, " ").trim();
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
