import type { DefaultErrorType } from "../../../defs";
import { deepFreeze } from "../../../tools/deepFreeze";
import { defineError } from "../../defineError";
import type { ErrorFluentBuilder } from "./fluent-builder.interface";
import type { BuilderState } from "./types";
import { cloneState } from "../utils";

/**
 * Creates an ErrorFluentBuilder from the given state.
 */
export function makeErrorBuilder<TData extends DefaultErrorType>(
  state: BuilderState<TData>,
): ErrorFluentBuilder<TData> {
  const builder: ErrorFluentBuilder<TData> = {
    id: state.id,

    dataSchema(schema) {
      return makeErrorBuilder(cloneState(state, { dataSchema: schema }));
    },

    format(fn) {
      return makeErrorBuilder(cloneState(state, { format: fn }));
    },

    remediation(advice) {
      return makeErrorBuilder(cloneState(state, { remediation: advice }));
    },

    build() {
      return deepFreeze(
        defineError<TData>({
          id: state.id,
          dataSchema: state.dataSchema,
          format: state.format,
          remediation: state.remediation,
        }),
      );
    },
  };

  return builder;
}
