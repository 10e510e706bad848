/**
 * Style configuration types.
 */

export type OptionScalar = string | number | boolean;

/**
 * A low-level host option value. Tuples cover sizes (`[width, height]`) and
 * font fallback lists.
 */
export type OptionValue = OptionScalar | ReadonlyArray<number> | ReadonlyArray<string>;

/**
 * A named, immutable block of host option values stored in the registry.
 */
export type StyleFragment = Readonly<Record<string, OptionValue>>;

/**
 * Intent keys (`figstyle.doc`), meta keys (`figstyle.wide`) and host options
 * (`font.family`) mixed in one ordered record. Insertion order is the merge order.
 */
export type StyleRequest = Readonly<Record<string, OptionValue>>;

/**
 * Either a plain record or a map, for callers that build requests incrementally.
 */
export type StyleRequestInput = StyleRequest | ReadonlyMap<string, OptionValue>;

/**
 * Flat host option map; the only artifact handed to the rendering layer.
 */
export type ResolvedStyle = Readonly<Record<string, OptionValue>>;

export interface HostDefaults {
  /** Minor tick divisions between consecutive major ticks. */
  readonly minorTicksPerMajor: number;
}

export interface StyleScope {
  readonly options: ResolvedStyle;
  readonly host: HostDefaults;
}
