/**
 * pipeable/tagged-error
 *
 * Tagged error classes: errors carrying a string `_tag` discriminant and
 * their props as readonly instance fields.
 *
 * @example
 * ```typescript
 * class StageTimeout extends TaggedError("StageTimeout", {
 *   message: (p: { stage: number }) => `stage ${p.stage} timed out`,
 * }) {}
 *
 * const error = new StageTimeout({ stage: 2 });
 * error._tag; // "StageTimeout"
 * error.stage; // 2
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Shape shared by every tagged error.
 */
export interface TaggedErrorBase<Tag extends string = string> extends Error {
  readonly _tag: Tag;
}

/**
 * Options accepted by `TaggedError(tag, options)`.
 */
export interface TaggedErrorOptions<Props extends object> {
  /** Builds the error message from the props. Defaults to the tag. */
  message?: (props: Props) => string;
}

/**
 * Options accepted by the constructor of a tagged error class.
 */
export interface TaggedErrorCreateOptions {
  /** The underlying error, exposed as `error.cause`. */
  cause?: unknown;
}

/**
 * Constructor produced by `TaggedError(...)`.
 */
export interface TaggedErrorConstructor<Tag extends string, Props extends object> {
  new (props: Props, options?: TaggedErrorCreateOptions): TaggedErrorBase<Tag> & Readonly<Props>;
  readonly tag: Tag;
}

/** Extracts the tag of a tagged error type. */
export type TagOf<E> = E extends TaggedErrorBase<infer Tag> ? Tag : never;

// =============================================================================
// Implementation
// =============================================================================

class TaggedErrorRoot extends Error implements TaggedErrorBase {
  readonly _tag: string;

  constructor(tag: string, message: string, options?: TaggedErrorCreateOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this._tag = tag;
    this.name = tag;
  }
}

function createTaggedError<Tag extends string, Props extends object = Record<never, never>>(
  tag: Tag,
  options: TaggedErrorOptions<Props> = {}
): TaggedErrorConstructor<Tag, Props> {
  const format = options.message ?? (() => tag);

  class Tagged extends TaggedErrorRoot {
    static readonly tag = tag;

    constructor(props: Props, createOptions?: TaggedErrorCreateOptions) {
      super(tag, format(props), createOptions);
      Object.assign(this, props);
    }
  }

  // Props are copied onto the instance at run time.
  return Tagged as unknown as TaggedErrorConstructor<Tag, Props>;
}

/**
 * Checks whether a value is an error created through `TaggedError`,
 * optionally with a specific tag.
 */
function isTaggedError(error: unknown): error is TaggedErrorBase;
function isTaggedError<Tag extends string>(error: unknown, tag: Tag): error is TaggedErrorBase<Tag>;
function isTaggedError(error: unknown, tag?: string): error is TaggedErrorBase {
  return error instanceof TaggedErrorRoot && (tag === undefined || error._tag === tag);
}

/**
 * Factory for tagged error classes.
 *
 * `TaggedError.isTaggedError(value, tag?)` narrows unknown values.
 */
export const TaggedError = Object.assign(createTaggedError, { isTaggedError });
