/**
 * Proxy Sheets – Error Taxonomy
 *
 * Every failure the compiler or the sheet generator raises is one of these classes.
 * Each carries the offending ids so a CLI run can point at the exact record that broke it.
 *
 *   - LoadError:          malformed or missing input data (dataset, override TOML, manifest, deck list)
 *   - MergeConflictError: duplicate ids, remap chains, unresolved remaps, dangling references
 *   - SerializationError: an output artifact could not be written
 *   - LayoutError:        unusable sheet geometry or an empty selection
 *   - AssetError:         a missing, corrupt or unreachable image (degrades one slot)
 *   - ConfigError:        the environment failed validation
 */

export interface BaseErrorOptions {
  ids?: ReadonlyArray<string | number>;
  cause?: unknown;
}

export class BaseError extends Error {
  readonly ids: string[];

  constructor(message: string, options: BaseErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.ids = (options.ids ?? []).map(String);
  }
}

export class LoadError extends BaseError {}

export class MergeConflictError extends BaseError {}

export class SerializationError extends BaseError {}

export class LayoutError extends BaseError {}

export class AssetError extends BaseError {}

/** Raised when an in-flight sheet generation is cancelled through its AbortSignal. */
export class GenerationAbortedError extends AssetError {}

export class ConfigError extends BaseError {}

/** Errors that make a compiler run fail with a nonzero exit code. */
export function isCompileError(err: unknown): err is LoadError | MergeConflictError | SerializationError {
  return (
    err instanceof LoadError || err instanceof MergeConflictError || err instanceof SerializationError
  );
}

/**
 * One-line description for logs and CLI output: `Name: message (ids: a, b)`.
 */
export function describeError(err: unknown): string {
  if (err instanceof BaseError) {
    const ids = err.ids.length > 0 ? ` (ids: ${err.ids.join(', ')})` : '';
    return `${err.name}: ${err.message}${ids}`;
  }
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}
