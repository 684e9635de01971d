import { invalidOptionsError } from "../errors";
import {
  CodecDefaults,
  IgnoreCondition,
  NumberHandling,
  ReferenceHandling,
} from "./types";
import type { CodecOptions, ResolvedCodecOptions } from "./types";

export const DEFAULT_MAX_DEPTH = 64;

const ALL_NUMBER_FLAGS =
  NumberHandling.AllowReadingFromString |
  NumberHandling.WriteAsString |
  NumberHandling.AllowNamedFloatingPointLiterals;

const PRESETS: Readonly<Record<CodecDefaults, ResolvedCodecOptions>> = {
  [CodecDefaults.General]: Object.freeze({
    propertyNamingPolicy: null,
    propertyNameCaseInsensitive: false,
    defaultIgnoreCondition: IgnoreCondition.Never,
    numberHandling: NumberHandling.Strict,
    referenceHandling: ReferenceHandling.None,
    includeFields: false,
    writeIndented: false,
    maxDepth: DEFAULT_MAX_DEPTH,
  }),
  [CodecDefaults.Web]: Object.freeze({
    propertyNamingPolicy: "camelCase",
    propertyNameCaseInsensitive: true,
    defaultIgnoreCondition: IgnoreCondition.Never,
    numberHandling: NumberHandling.AllowReadingFromString,
    referenceHandling: ReferenceHandling.None,
    includeFields: false,
    writeIndented: false,
    maxDepth: DEFAULT_MAX_DEPTH,
  }),
};

const pick = <T>(override: T | undefined, fallback: T): T =>
  override === undefined ? fallback : override;

export const normalizeMaxDepth = (
  value: number | undefined,
  fallback: number,
): number => {
  if (value === undefined) {
    return fallback;
  }
  if (value === Number.POSITIVE_INFINITY) {
    return Number.POSITIVE_INFINITY;
  }
  if (Number.isFinite(value) && value >= 0) {
    return Math.floor(value);
  }
  throw invalidOptionsError.create({
    message: `maxDepth must be a non-negative number, received ${value}`,
  });
};

const assertValid = (options: ResolvedCodecOptions): void => {
  if (options.defaultIgnoreCondition === IgnoreCondition.Always) {
    throw invalidOptionsError.create({
      message:
        "defaultIgnoreCondition cannot be Always; ignore members individually instead",
    });
  }
  if (!Object.values(IgnoreCondition).includes(options.defaultIgnoreCondition)) {
    throw invalidOptionsError.create({
      message: `Unknown defaultIgnoreCondition "${String(options.defaultIgnoreCondition)}"`,
    });
  }
  if (!Object.values(ReferenceHandling).includes(options.referenceHandling)) {
    throw invalidOptionsError.create({
      message: `Unknown referenceHandling "${String(options.referenceHandling)}"`,
    });
  }
  const flags = options.numberHandling;
  if (!Number.isInteger(flags) || flags < 0 || (flags & ~ALL_NUMBER_FLAGS) !== 0) {
    throw invalidOptionsError.create({
      message: `numberHandling ${flags} is not a combination of NumberHandling flags`,
    });
  }
};

/**
 * Layer overrides over resolved options. `undefined` keeps the base value,
 * `null` clears the naming policy.
 */
export function mergeCodecOptions(
  base: ResolvedCodecOptions,
  overrides: CodecOptions = {},
): ResolvedCodecOptions {
  const merged: ResolvedCodecOptions = {
    propertyNamingPolicy: pick(
      overrides.propertyNamingPolicy,
      base.propertyNamingPolicy,
    ),
    propertyNameCaseInsensitive: pick(
      overrides.propertyNameCaseInsensitive,
      base.propertyNameCaseInsensitive,
    ),
    defaultIgnoreCondition: pick(
      overrides.defaultIgnoreCondition,
      base.defaultIgnoreCondition,
    ),
    numberHandling: pick(overrides.numberHandling, base.numberHandling),
    referenceHandling: pick(overrides.referenceHandling, base.referenceHandling),
    includeFields: pick(overrides.includeFields, base.includeFields),
    writeIndented: pick(overrides.writeIndented, base.writeIndented),
    maxDepth: normalizeMaxDepth(overrides.maxDepth, base.maxDepth),
  };
  assertValid(merged);
  return Object.freeze(merged);
}

export function createCodecOptions(
  preset: CodecDefaults = CodecDefaults.General,
  overrides: CodecOptions = {},
): ResolvedCodecOptions {
  return mergeCodecOptions(PRESETS[preset], overrides);
}

export const hasNumberFlag = (
  handling: NumberHandling,
  flag: NumberHandling,
): boolean => (handling & flag) === flag;
