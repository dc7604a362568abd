export class CertrunError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "CertrunError";
  }
}

export class ConfigError extends CertrunError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class SessionStateError extends CertrunError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "SessionStateError";
  }
}

export class CatalogError extends CertrunError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "CatalogError";
  }
}

export class ResourceProgramError extends CertrunError {
  constructor(
    message: string,
    public readonly text: string,
  ) {
    super(message);
    this.name = "ResourceProgramError";
  }
}

// =============================================================================
// RESUME
// =============================================================================

export class SessionResumeError extends CertrunError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "SessionResumeError";
  }
}

export class CorruptedSessionError extends SessionResumeError {
  constructor(
    message: string,
    public readonly field?: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "CorruptedSessionError";
  }
}

export class IncompatibleSessionError extends SessionResumeError {
  constructor(
    message: string,
    public readonly version?: unknown,
  ) {
    super(message);
    this.name = "IncompatibleSessionError";
  }
}

export class IncompatibleJobError extends SessionResumeError {
  constructor(
    message: string,
    public readonly jobId: string,
  ) {
    super(message);
    this.name = "IncompatibleJobError";
  }
}

export class BrokenReferenceToExternalFileError extends SessionResumeError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = "BrokenReferenceToExternalFileError";
  }
}
