export class ExportAuditError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExportAuditError";
  }
}

export class ConfigError extends ExportAuditError {
  constructor(configPath: string, detail: string) {
    super(`Invalid config at ${configPath}: ${detail}`);
    this.name = "ConfigError";
  }
}

export class AlreadyInitializedError extends ExportAuditError {
  constructor(configPath: string) {
    super(`Config already exists at ${configPath}`);
    this.name = "AlreadyInitializedError";
  }
}

export class SymbolNotFoundError extends ExportAuditError {
  constructor(id: string) {
    super(`No symbol with id ${id}`);
    this.name = "SymbolNotFoundError";
  }
}

export type GitStep =
  | "discover"
  | "workdir"
  | "resolve-ref"
  | "head"
  | "merge-base"
  | "diff";

export class GitError extends ExportAuditError {
  readonly step: GitStep;

  constructor(step: GitStep, message: string) {
    super(message);
    this.name = "GitError";
    this.step = step;
  }
}
