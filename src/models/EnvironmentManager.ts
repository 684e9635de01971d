export type EnvCastType = "string" | "number" | "boolean";

type EnvCastResult = {
  string: string;
  number: number;
  boolean: boolean;
};

/**
 * Reads environment variables with type casting and defaults.
 */
export class EnvironmentManager {
  private readonly envStore = new Map<string, string | number | boolean>();
  private readonly castHandlers: {
    [K in EnvCastType]: (value: string) => EnvCastResult[K];
  } = {
    string: (value) => value,
    number: (value) => {
      const parsed = parseFloat(value);
      return isNaN(parsed) ? 0 : parsed;
    },
    boolean: (value) =>
      !["", "0", "false", "no", "undefined", "null"].includes(
        value.toLowerCase(),
      ),
  };

  constructor(private readonly source: NodeJS.ProcessEnv = process.env) {}

  /**
   * Read a variable, cast it, and remember the result.
   * Falls back to `defaultValue` when the variable is unset or empty.
   */
  public get<K extends EnvCastType>(
    key: string,
    cast: K,
    defaultValue: EnvCastResult[K],
  ): EnvCastResult[K] {
    const raw = this.source[key];
    const value =
      raw === undefined || raw === "" ? defaultValue : this.castHandlers[cast](raw);
    this.envStore.set(key, value);
    return value;
  }

  /**
   * Read a variable restricted to a known set of values.
   */
  public oneOf<T extends string>(
    key: string,
    allowed: readonly T[],
    defaultValue: T,
  ): T {
    const raw = this.source[key];
    const match = allowed.find((candidate) => candidate === raw);
    const value = match ?? defaultValue;
    this.envStore.set(key, value);
    return value;
  }

  /**
   * Values read so far, for diagnostics.
   */
  public snapshot(): Record<string, string | number | boolean> {
    return Object.fromEntries(this.envStore);
  }
}
