/**
 * Error types raised by waymark.
 *
 * Every error carries a stable `code` so callers can tell a missing step
 * from a rejected path without matching on message text.
 */

export type WaymarkErrorCode =
  | 'NO_STEPS_FOUND'
  | 'INVALID_STEP_ID'
  | 'STEP_NOT_FOUND'
  | 'REQUIREMENT_NOT_FOUND'
  | 'UNSAFE_PATH'
  | 'EMPTY_CONTENT'
  | 'STATE_IO'
  | 'MANIFEST_PARSE';

export class WaymarkError extends Error {
  readonly code: WaymarkErrorCode;

  constructor(code: WaymarkErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WaymarkError';
    this.code = code;
  }
}

/**
 * The prompt document contains no `# Step <id>` header.
 */
export class NoStepsFoundError extends WaymarkError {
  constructor() {
    super('NO_STEPS_FOUND', 'no steps found');
    this.name = 'NoStepsFoundError';
  }
}

/**
 * A step header names an ID that cannot key the progress record map.
 */
export class InvalidStepIdError extends WaymarkError {
  readonly stepId: string;

  constructor(stepId: string) {
    super('INVALID_STEP_ID', `step id '${stepId}' is reserved`);
    this.name = 'InvalidStepIdError';
    this.stepId = stepId;
  }
}

export class StepNotFoundError extends WaymarkError {
  readonly stepId: string;

  constructor(stepId: string) {
    super('STEP_NOT_FOUND', `step '${stepId}' not found`);
    this.name = 'StepNotFoundError';
    this.stepId = stepId;
  }
}

export class RequirementNotFoundError extends WaymarkError {
  readonly requirementPath: string;

  constructor(requirementPath: string) {
    super(
      'REQUIREMENT_NOT_FOUND',
      `requirement '${requirementPath}' not found\n` +
        'Hint: Requirements are stored in .waymark/ - are you in the correct project directory?'
    );
    this.name = 'RequirementNotFoundError';
    this.requirementPath = requirementPath;
  }
}

/**
 * A requirement path would resolve outside the requirements directory.
 */
export class PathSafetyError extends WaymarkError {
  readonly requirementPath: string;

  constructor(requirementPath: string, reason: string) {
    super('UNSAFE_PATH', `invalid path: ${requirementPath} (${reason})`);
    this.name = 'PathSafetyError';
    this.requirementPath = requirementPath;
  }
}

export class EmptyContentError extends WaymarkError {
  constructor() {
    super(
      'EMPTY_CONTENT',
      'content is required (provide as argument or via stdin)'
    );
    this.name = 'EmptyContentError';
  }
}

/**
 * Reading, writing or decoding a persisted document failed.
 */
export class StateIOError extends WaymarkError {
  readonly filePath: string;

  constructor(action: string, filePath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('STATE_IO', `${action} ${filePath}: ${detail}`, { cause });
    this.name = 'StateIOError';
    this.filePath = filePath;
  }
}

export class ManifestParseError extends WaymarkError {
  constructor(message: string) {
    super('MANIFEST_PARSE', message);
    this.name = 'ManifestParseError';
  }
}

/**
 * Check whether an unknown error is a Node.js errno error with the given code.
 *
 * Matches on shape alone: errors raised by `fs` under a Jest sandbox are not
 * instances of the sandbox's `Error`.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === code
  );
}
