/**
 * Error handling for the lncRNA discovery pipeline
 *
 * Every failure the pipeline can raise is a LincerError subclass, so the
 * command line can report it uniformly and Effect programs can narrow on it.
 */

import { Effect } from "effect";

/**
 * Base error class for all lincer errors
 */
export class LincerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "LincerError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Missing or invalid command-line arguments
 */
export class UsageError extends LincerError {
  constructor(
    message: string,
    public readonly usage: string
  ) {
    super(message, "USAGE_ERROR");
    this.name = "UsageError";
  }
}

/**
 * Configuration or options rejected by their schema
 */
export class ValidationError extends LincerError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * An annotation or table line that lacks a field downstream joins depend on
 */
export class MalformedInputError extends LincerError {
  constructor(
    message: string,
    public readonly format: string,
    public readonly filePath?: string,
    lineNumber?: number,
    context?: string
  ) {
    super(filePath !== undefined ? `${message} in ${filePath}` : message, "MALFORMED_INPUT", lineNumber, context);
    this.name = "MalformedInputError";
  }

  /**
   * Attach the file a line-level error came from
   */
  inFile(filePath: string): MalformedInputError {
    if (this.filePath !== undefined) {
      return this;
    }
    return new MalformedInputError(this.message, this.format, filePath, this.lineNumber, this.context);
  }
}

/**
 * An external comparator or merger that exited unsuccessfully
 */
export class ExternalToolError extends LincerError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly args: ReadonlyArray<string>,
    public readonly exitCode?: number,
    public readonly stderr?: string
  ) {
    super(message, "EXTERNAL_TOOL_ERROR", undefined, `Command: ${[command, ...args].join(" ")}`);
    this.name = "ExternalToolError";
  }

  /**
   * Create a tool error for a process that ran and exited non-zero
   */
  static fromExitCode(
    command: string,
    args: ReadonlyArray<string>,
    exitCode: number,
    stderr: string
  ): ExternalToolError {
    return new ExternalToolError(
      `${command} exited with status ${exitCode}`,
      command,
      args,
      exitCode,
      stderr
    );
  }

  /**
   * Create a tool error for a process that could not be started at all
   */
  static fromSpawnFailure(
    command: string,
    args: ReadonlyArray<string>,
    cause: unknown
  ): ExternalToolError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ExternalToolError(
      `Failed to run ${command}: ${reason}. Check that ${command} is installed and on PATH`,
      command,
      args
    );
  }

  override toString(): string {
    let msg = super.toString();
    const stderr = this.stderr?.trim();
    if (stderr !== undefined && stderr !== "") {
      const tail = stderr.split(/\r?\n/).slice(-10).join("\n");
      msg += `\nStderr (last lines):\n${tail}`;
    }
    return msg;
  }
}

/**
 * A novel isoform whose matched known gene name has no gene id in the known catalog
 */
export class LookupGapError extends LincerError {
  constructor(
    public readonly transcriptId: string,
    public readonly geneName: string
  ) {
    super(
      `No known lncRNA gene_id for gene_name '${geneName}' (novel isoform '${transcriptId}')`,
      "LOOKUP_GAP"
    );
    this.name = "LookupGapError";
  }
}

/**
 * File-system failures with the path and a troubleshooting hint
 */
export class FileError extends LincerError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "link" | "rename" | "remove",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} failed for '${filePath}': ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError
    );
  }

  /**
   * Get helpful suggestion based on system error
   */
  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different output directory";
    }

    return undefined;
  }
}

/**
 * Normalize anything thrown inside a pipeline step into a LincerError
 *
 * Errors that already belong to the taxonomy pass through untouched.
 */
export function toLincerError(error: unknown, context?: string): LincerError {
  if (error instanceof LincerError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new LincerError(message, "UNEXPECTED_ERROR", undefined, context);
}

/**
 * Run a synchronous parsing step inside an Effect program
 *
 * Line-level MalformedInputErrors are tagged with the file they came from.
 */
export function attempt<A>(thunk: () => A, filePath?: string): Effect.Effect<A, LincerError> {
  return Effect.try({
    try: thunk,
    catch: (error) =>
      error instanceof MalformedInputError && filePath !== undefined
        ? error.inFile(filePath)
        : toLincerError(error, filePath),
  });
}
