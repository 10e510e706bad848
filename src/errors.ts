/**
 * Error types thrown by figstyle.
 *
 * Every error carries a machine-readable `code` next to its message so callers
 * can branch without matching on text.
 */

export type FigstyleErrorCode =
  | 'INVALID_OPTION_VALUE'
  | 'INVALID_SQUARE_INDEX'
  | 'INVALID_TICK_COUNT'
  | 'INVALID_TICK_RANGE'
  | 'INVALID_REGISTRY'
  | 'EXTERNAL_TOOL_FAILED';

export class FigstyleError extends Error {
  readonly code: FigstyleErrorCode;

  constructor(message: string, code: FigstyleErrorCode) {
    super(message);
    this.name = 'FigstyleError';
    this.code = code;
  }
}

const describeValue = (value: unknown): string =>
  Array.isArray(value) ? `[${value.map(String).join(', ')}]` : String(value);

/**
 * A request named a `family.value` pair the registry does not define, or gave
 * a meta key a value of the wrong kind.
 */
export class InvalidOptionValueError extends FigstyleError {
  readonly key: string;
  readonly value: unknown;

  constructor(key: string, value: unknown) {
    super(`'${key}': '${describeValue(value)}' is an invalid option value.`, 'INVALID_OPTION_VALUE');
    this.name = 'InvalidOptionValueError';
    this.key = key;
    this.value = value;
  }
}

export class InvalidSquareIndexError extends FigstyleError {
  readonly value: unknown;

  constructor(key: string, value: unknown) {
    super(`'${key}' must be 0 or 1, got '${describeValue(value)}'.`, 'INVALID_SQUARE_INDEX');
    this.name = 'InvalidSquareIndexError';
    this.value = value;
  }
}

export class InvalidTickCountError extends FigstyleError {
  readonly count: number;

  constructor(count: number) {
    super(`Invalid tick count: ${count}. Must be an integer >= 2.`, 'INVALID_TICK_COUNT');
    this.name = 'InvalidTickCountError';
    this.count = count;
  }
}

export class InvalidTickRangeError extends FigstyleError {
  constructor(message: string) {
    super(message, 'INVALID_TICK_RANGE');
    this.name = 'InvalidTickRangeError';
  }
}

export class RegistryDefinitionError extends FigstyleError {
  readonly fragmentName: string;

  constructor(fragmentName: string, reason: string) {
    super(`Invalid fragment '${fragmentName}': ${reason}`, 'INVALID_REGISTRY');
    this.name = 'RegistryDefinitionError';
    this.fragmentName = fragmentName;
  }
}

/**
 * An external post-processing tool ran but exited unsuccessfully.
 */
export class ExternalToolError extends FigstyleError {
  readonly tool: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(tool: string, exitCode: number | null, stderr: string) {
    const detail = stderr.trim();
    super(
      `${tool} exited with ${exitCode === null ? 'no exit code' : `code ${exitCode}`}` +
        (detail.length > 0 ? `: ${detail}` : ''),
      'EXTERNAL_TOOL_FAILED'
    );
    this.name = 'ExternalToolError';
    this.tool = tool;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}
