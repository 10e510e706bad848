import type { OptionValue, StyleFragment } from './types';
import { defaultFragments, metaKeys, PREAMBLE_OPTION, weedKeys } from './defaults';
import { RegistryDefinitionError } from '../errors';
import hostOptionNames from './hostOptions.json';

export interface RuleRegistryInput {
  /** Fragments keyed by dotted name. Defaults to the built-in fragments. */
  readonly fragments?: Readonly<Record<string, StyleFragment>>;
  /** Extra host option names accepted as passthrough keys. */
  readonly passthroughKeys?: Iterable<string>;
}

/**
 * Read-only table of named fragments plus the key classes the resolver needs.
 * Safe to share: nothing reachable from a registry can be mutated.
 */
export interface RuleRegistry {
  lookup(name: string): StyleFragment | undefined;
  has(name: string): boolean;
  names(): ReadonlyArray<string>;
  isPassthroughKey(key: string): boolean;
  isMetaKey(key: string): boolean;
  isWeedKey(key: string): boolean;
  readonly weedKeys: ReadonlyArray<string>;
}

const META_KEY_SET: ReadonlySet<string> = new Set(Object.values(metaKeys));
const WEED_KEY_SET: ReadonlySet<string> = new Set(weedKeys);

const isPlainObject = (value: unknown): value is Readonly<Record<string, unknown>> => {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

/**
 * Returns a frozen copy of a valid option value, or `undefined` for anything a
 * host cannot take (non-finite numbers, mixed or nested arrays, objects).
 */
const toOptionValue = (value: unknown): OptionValue | undefined => {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : undefined;
    case 'object': {
      if (!Array.isArray(value)) return undefined;
      const numbers: number[] = [];
      const strings: string[] = [];
      for (const item of value) {
        if (typeof item === 'number' && Number.isFinite(item)) numbers.push(item);
        else if (typeof item === 'string') strings.push(item);
        else return undefined;
      }
      if (numbers.length === value.length) return Object.freeze(numbers);
      if (strings.length === value.length) return Object.freeze(strings);
      return undefined;
    }
    default:
      return undefined;
  }
};

function freezeFragment(name: string, fragment: unknown): StyleFragment {
  if (!isPlainObject(fragment)) {
    throw new RegistryDefinitionError(name, 'fragment must be a plain object.');
  }

  const frozen: Record<string, OptionValue> = {};
  for (const [option, value] of Object.entries(fragment)) {
    if (META_KEY_SET.has(option)) {
      throw new RegistryDefinitionError(name, `'${option}' is a meta key and cannot be defined by a fragment.`);
    }
    const normalized = toOptionValue(value);
    if (normalized === undefined) {
      throw new RegistryDefinitionError(name, `'${option}' has an unsupported value.`);
    }
    if (option === PREAMBLE_OPTION && typeof normalized !== 'string') {
      throw new RegistryDefinitionError(name, `'${option}' must be a string.`);
    }
    frozen[option] = normalized;
  }
  return Object.freeze(frozen);
}

/**
 * Builds an immutable registry. Building twice from the same input yields
 * registries with equal lookups.
 *
 * @throws {RegistryDefinitionError} If a fragment is malformed.
 */
export function createRuleRegistry(input: RuleRegistryInput = {}): RuleRegistry {
  const source = input.fragments ?? defaultFragments;

  const fragments = new Map<string, StyleFragment>();
  for (const [name, fragment] of Object.entries(source)) {
    if (name.trim().length === 0) {
      throw new RegistryDefinitionError(name, 'fragment name must not be empty.');
    }
    fragments.set(name, freezeFragment(name, fragment));
  }

  const passthrough = new Set<string>(hostOptionNames);
  for (const key of input.passthroughKeys ?? []) passthrough.add(key);
  // Meta and weed keys keep their meaning even if a caller lists them as host options.
  for (const key of META_KEY_SET) passthrough.delete(key);
  for (const key of WEED_KEY_SET) passthrough.delete(key);

  const sortedNames = Object.freeze(Array.from(fragments.keys()).sort());
  const frozenWeedKeys = Object.freeze(Array.from(WEED_KEY_SET));

  return Object.freeze({
    lookup: (name: string) => fragments.get(name),
    has: (name: string) => fragments.has(name),
    names: () => sortedNames,
    isPassthroughKey: (key: string) => passthrough.has(key),
    isMetaKey: (key: string) => META_KEY_SET.has(key),
    isWeedKey: (key: string) => WEED_KEY_SET.has(key),
    weedKeys: frozenWeedKeys,
  });
}

export const defaultRegistry: RuleRegistry = createRuleRegistry();
