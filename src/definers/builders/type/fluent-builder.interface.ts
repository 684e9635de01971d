import type { FieldType } from "../../../codec/field-types";
import type { Constructor } from "../../../codec/types";
import type {
  FieldOptions,
  TypeDefinition,
} from "../../../types/typeDefinition";

export interface TypeFluentBuilder<
  T extends object,
  TFields extends object = Record<never, never>,
> {
  type: Constructor<T>;
  /**
   * Declare a member. Members are encoded in declaration order.
   */
  field<K extends keyof T & string>(
    name: K,
    type: FieldType<T[K]>,
    options?: FieldOptions<T, T[K]>,
  ): TypeFluentBuilder<T, TFields & Record<K, T[K]>>;
  /**
   * Build instances from decoded members instead of assigning them to a
   * shell. Parameters are decoded first; the rest are assigned afterwards.
   */
  constructWith<K extends keyof TFields & string>(
    parameters: readonly K[],
    create: (args: Pick<TFields, K>) => T,
  ): TypeFluentBuilder<T, TFields>;
  /** Allocate the empty instance members are assigned to */
  factory(create: () => T): TypeFluentBuilder<T, TFields>;
  build(): TypeDefinition<T>;
}
