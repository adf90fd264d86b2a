export type ErrorCode =
  | 'CFG-SPEED-CONFLICT'
  | 'CFG-SPEED-MISSING'
  | 'CFG-INVALID-OPTION'
  | 'GEO-DIRECTION-INVALID'
  | 'GEN-PATTERN-INVALID'
  | 'SCN-UNDEFINED-ID';

/**
 * Base class for every error raised while configuring or generating arrows.
 * Carries a stable code so outer surfaces can report without parsing messages.
 */
export class ArrowError extends Error {
  readonly code: ErrorCode;
  readonly hint?: string;

  constructor(code: ErrorCode, message: string, hint?: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.hint = hint;
  }
}

export class ConfigurationError extends ArrowError {
  constructor(
    code: 'CFG-SPEED-CONFLICT' | 'CFG-SPEED-MISSING' | 'CFG-INVALID-OPTION',
    message: string,
    hint?: string
  ) {
    super(code, message, hint);
  }
}

export class InvalidDirectionError extends ArrowError {
  readonly direction: string;

  constructor(direction: string, accepted: readonly string[]) {
    super(
      'GEO-DIRECTION-INVALID',
      `Invalid direction: ${direction}`,
      `Use ${accepted.map(d => `'${d}'`).join(', ')}.`
    );
    this.direction = direction;
  }
}

export class InvalidPatternError extends ArrowError {
  readonly pattern: string;

  constructor(pattern: string, accepted: readonly string[]) {
    super('GEN-PATTERN-INVALID', `Unknown arrow pattern: ${pattern}`, `Use one of: ${accepted.join(', ')}.`);
    this.pattern = pattern;
  }
}

export class SceneReferenceError extends ArrowError {
  readonly ids: string[];

  constructor(ids: string[]) {
    super('SCN-UNDEFINED-ID', `Scene references undefined id(s): ${ids.join(', ')}`);
    this.ids = ids;
  }
}

export function isArrowError(err: unknown): err is ArrowError {
  return err instanceof ArrowError;
}
