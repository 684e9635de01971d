/**
 * Zod-compatible validation contract. Anything exposing `parse()` works.
 */
export interface IValidationSchema<T = unknown> {
  /**
   * Parse and validate the input data.
   * Should throw an error if validation fails.
   * Can transform the data if the schema supports transformations.
   */
  parse(input: unknown): T;
}
