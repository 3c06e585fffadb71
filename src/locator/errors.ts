export type TrajviewErrorKind =
  | "FileNotFound"
  | "JsonParseError"
  | "StructuralError"
  | "NotFoundError"
  | "EmptyTrajectoryError"
  | "ConfigError";

/**
 * Base class for every data problem the viewer reports to the user.
 * The message is shown verbatim after an `[error]` tag.
 */
export class TrajviewError extends Error {
  readonly kind: TrajviewErrorKind;

  constructor(kind: TrajviewErrorKind, message: string) {
    super(message);
    this.name = "TrajviewError";
    this.kind = kind;
  }
}

export class FileNotFoundError extends TrajviewError {
  /** Path that was looked up */
  readonly filePath: string;

  constructor(filePath: string) {
    super("FileNotFound", `File not found: ${filePath}`);
    this.name = "FileNotFoundError";
    this.filePath = filePath;
  }
}

export class JsonParseError extends TrajviewError {
  constructor(detail: string) {
    super("JsonParseError", `Failed to parse JSON: ${detail}`);
    this.name = "JsonParseError";
  }
}

export class StructuralError extends TrajviewError {
  constructor(message: string) {
    super("StructuralError", message);
    this.name = "StructuralError";
  }
}

export class NotFoundError extends TrajviewError {
  readonly taskId: number;
  readonly trial: number;

  constructor(taskId: number, trial: number) {
    super("NotFoundError", `No record found for task_id=${taskId}, trial=${trial}.`);
    this.name = "NotFoundError";
    this.taskId = taskId;
    this.trial = trial;
  }
}

export class EmptyTrajectoryError extends TrajviewError {
  constructor() {
    super("EmptyTrajectoryError", "No 'traj' found in the selected record.");
    this.name = "EmptyTrajectoryError";
  }
}

export class ConfigError extends TrajviewError {
  constructor(message: string) {
    super("ConfigError", message);
    this.name = "ConfigError";
  }
}

export function isTrajviewError(err: unknown): err is TrajviewError {
  return err instanceof TrajviewError;
}
