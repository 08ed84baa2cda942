export type NotebookSourceErrorCode =
  | "INITIALIZATION"
  | "RENDER"
  | "USAGE"
  | "UNSUPPORTED_LANGUAGE"
  | "FORMAT"
  | "NO_SUCH_KERNEL";

export class NotebookSourceError extends Error {
  constructor(
    message: string,
    public readonly code: NotebookSourceErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "NotebookSourceError";
  }
}

/** The source could not be constructed; no partial object exists. */
export class SourceInitializationError extends NotebookSourceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "INITIALIZATION", options);
    this.name = "SourceInitializationError";
  }
}

export type ValidationSection = {
  readonly title: string;
  readonly body: string;
};

export type ValidationReport = {
  readonly missing: readonly string[];
  readonly extra: readonly string[];
  readonly sections: readonly ValidationSection[];
};

/**
 * Rendering was rejected. `report` holds every finding at once and
 * `renderedText` the document that was produced but not committed.
 */
export class RenderError extends NotebookSourceError {
  constructor(
    message: string,
    readonly report?: ValidationReport,
    readonly renderedText?: string,
  ) {
    super(message, "RENDER");
    this.name = "RenderError";
  }
}

/** The caller broke the API contract (not a problem with the document). */
export class UsageError extends NotebookSourceError {
  constructor(
    message: string,
    code: "USAGE" | "UNSUPPORTED_LANGUAGE" = "USAGE",
  ) {
    super(message, code);
    this.name = "UsageError";
  }
}

export class UnsupportedLanguageError extends UsageError {
  constructor(message: string, readonly language?: string) {
    super(message, "UNSUPPORTED_LANGUAGE");
    this.name = "UnsupportedLanguageError";
  }
}

export class NotebookFormatError extends NotebookSourceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "FORMAT", options);
    this.name = "NotebookFormatError";
  }
}

export class NoSuchKernelError extends NotebookSourceError {
  constructor(
    readonly kernelName: string,
    readonly available: string[],
    options?: { cause?: unknown },
  ) {
    super(`No such kernel named ${kernelName}`, "NO_SUCH_KERNEL", options);
    this.name = "NoSuchKernelError";
  }
}
