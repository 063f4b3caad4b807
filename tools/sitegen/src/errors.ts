/**
 * errors.ts — Build failures. Every one of them aborts the whole build.
 */

export class SiteBuildError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed front-matter, or a required field missing / of the wrong type. */
export class ParseError extends SiteBuildError {
  constructor(
    readonly file: string,
    message: string,
    readonly field?: string,
  ) {
    super(field ? `${file}: ${field}: ${message}` : `${file}: ${message}`);
  }
}

export class TemplateNotFoundError extends SiteBuildError {
  constructor(
    readonly layout: string,
    readonly file: string,
  ) {
    super(`${file}: no template registered for layout "${layout}"`);
  }
}

/** Duplicate output path or unresolved internal reference. */
export class BuildError extends SiteBuildError {
  constructor(
    message: string,
    readonly file?: string,
    readonly path?: string,
  ) {
    super(message);
  }
}

export class ConfigError extends SiteBuildError {}
