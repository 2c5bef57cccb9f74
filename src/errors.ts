/**
 * Error taxonomy for layer exploration
 *
 * Every error here is fatal to the batch. Nothing in the pipeline catches
 * them; the CLI and the MCP server report them at the top.
 */

export class ExplorerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * An implementation directory named in the variant list does not exist
 */
export class ConfigurationError extends ExplorerError {
  constructor(
    message: string,
    readonly implDir: string
  ) {
    super(message);
  }
}

/**
 * The synthesis tool could not be started or exited nonzero
 */
export class ToolFailure extends ExplorerError {
  constructor(
    message: string,
    readonly implDir: string,
    readonly exitCode: number | null
  ) {
    super(message);
  }
}

/**
 * A report the synthesis run should have produced is absent
 */
export class MissingArtifactError extends ExplorerError {
  constructor(
    message: string,
    readonly artifactPath: string
  ) {
    super(message);
  }
}

/**
 * A report or input list could not be interpreted
 */
export class ParseError extends ExplorerError {
  constructor(
    message: string,
    readonly source: string
  ) {
    super(message);
  }
}
