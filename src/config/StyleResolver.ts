import type {
  OptionValue,
  ResolvedStyle,
  StyleFragment,
  StyleRequestInput,
  StyleScope,
} from './types';
import {
  COMMON_SUFFIX,
  hostDefaults,
  metaKeys,
  PREAMBLE_OPTION,
  SIZE_OPTION,
  TYPESET_FRAGMENT,
  WIDE_SIZE_OPTION,
} from './defaults';
import { defaultRegistry } from './registry';
import type { RuleRegistry } from './registry';
import { InvalidOptionValueError, InvalidSquareIndexError } from '../errors';

type RequestEntry = readonly [key: string, value: OptionValue];

const isRequestMap = (request: StyleRequestInput): request is ReadonlyMap<string, OptionValue> =>
  request instanceof Map;

const requestEntries = (request: StyleRequestInput): ReadonlyArray<RequestEntry> =>
  isRequestMap(request) ? Array.from(request.entries()) : Object.entries(request);

// `false`, `0`, `''` and empty tuples switch a meta key off.
const isTruthy = (value: OptionValue | undefined): boolean => {
  if (value === undefined) return false;
  if (typeof value === 'object') return value.length > 0;
  return Boolean(value);
};

const isSizePair = (value: unknown): value is readonly [number, number] =>
  Array.isArray(value) &&
  value.length === 2 &&
  typeof value[0] === 'number' &&
  typeof value[1] === 'number';

// Request tuples are the caller's; the resolved style keeps its own frozen copy.
const freezeValue = (value: OptionValue): OptionValue => {
  if (typeof value !== 'object') return value;
  const numbers: number[] = [];
  const strings: string[] = [];
  for (const item of value) {
    if (typeof item === 'number') numbers.push(item);
    else strings.push(item);
  }
  return Object.freeze(strings.length > 0 ? strings : numbers);
};

const formatFamilyValue = (value: OptionValue): string =>
  typeof value === 'object' ? value.join(',') : String(value);

/**
 * Expands a request of intent keys into a flat map of host options.
 *
 * Merge order:
 * 1. intent families in request order (`family.common`, then `family.<value>`)
 * 2. host options named directly in the request
 * 3. typesetting, wide and square layouts, then the preamble
 *
 * Within a step the last write wins, except that preamble text from fragments
 * is concatenated in merge order.
 *
 * @throws {InvalidOptionValueError} If a `family.value` pair is not registered,
 *   or a preamble is not a string.
 * @throws {InvalidSquareIndexError} If `figstyle.square` is not 0 or 1.
 */
export function resolveStyle(
  request: StyleRequestInput,
  registry: RuleRegistry = defaultRegistry
): ResolvedStyle {
  const options = new Map<string, OptionValue>();
  const passthrough: RequestEntry[] = [];
  const meta = new Map<string, OptionValue>();
  let preamble: string | undefined;

  const merge = (fragment: StyleFragment): void => {
    for (const [option, value] of Object.entries(fragment)) {
      if (option === PREAMBLE_OPTION && typeof value === 'string') {
        preamble = (preamble ?? '') + value;
      } else {
        options.set(option, value);
      }
    }
  };

  for (const [key, value] of requestEntries(request)) {
    if (registry.isMetaKey(key)) {
      meta.set(key, value);
      continue;
    }
    if (registry.isPassthroughKey(key)) {
      passthrough.push([key, value]);
      continue;
    }

    const common = registry.lookup(`${key}.${COMMON_SUFFIX}`);
    if (common) merge(common);

    const fragment = registry.lookup(`${key}.${formatFamilyValue(value)}`);
    if (!fragment) throw new InvalidOptionValueError(key, value);
    merge(fragment);
  }

  // Host options named explicitly override anything derived from intents.
  for (const [key, value] of passthrough) {
    if (key === PREAMBLE_OPTION) {
      if (typeof value !== 'string') throw new InvalidOptionValueError(key, value);
      preamble = value;
    } else {
      options.set(key, freezeValue(value));
    }
  }

  if (isTruthy(meta.get(metaKeys.typeset))) {
    const typeset = registry.lookup(TYPESET_FRAGMENT);
    if (typeset) merge(typeset);
  }

  if (isTruthy(meta.get(metaKeys.wide))) {
    const wideSize = options.get(WIDE_SIZE_OPTION);
    if (wideSize !== undefined && options.has(SIZE_OPTION)) {
      options.set(SIZE_OPTION, wideSize);
    }
  }

  if (meta.has(metaKeys.square)) {
    const index = meta.get(metaKeys.square);
    if (index !== 0 && index !== 1) throw new InvalidSquareIndexError(metaKeys.square, index);
    const size = options.get(SIZE_OPTION);
    if (isSizePair(size)) {
      const side = size[index];
      options.set(SIZE_OPTION, Object.freeze([side, side]));
    }
  }

  const extraPreamble = meta.get(metaKeys.preamble);
  if (extraPreamble !== undefined && typeof extraPreamble !== 'string') {
    throw new InvalidOptionValueError(metaKeys.preamble, extraPreamble);
  }
  if (preamble !== undefined || extraPreamble !== undefined) {
    options.set(PREAMBLE_OPTION, (preamble ?? '') + (extraPreamble ?? ''));
  }

  for (const key of registry.weedKeys) options.delete(key);

  return Object.freeze(Object.fromEntries(options));
}

/**
 * Resolves a request once and pairs it with the host-side defaults, for callers
 * that hand both to their rendering layer in one place.
 */
export function createStyleScope(
  request: StyleRequestInput,
  registry: RuleRegistry = defaultRegistry
): StyleScope {
  return Object.freeze({
    options: resolveStyle(request, registry),
    host: hostDefaults,
  });
}

export const StyleResolver = { resolve: resolveStyle, scope: createStyleScope } as const;
