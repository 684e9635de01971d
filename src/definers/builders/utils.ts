// Freezes and returns a new builder state with a patch applied.
export function cloneState<TState extends object>(
  s: TState,
  patch: Partial<TState>,
): TState {
  const next: TState = { ...s, ...patch };
  Object.freeze(next);
  return next;
}

// Append to a readonly list without mutating the previous state.
export function appendItem<T>(
  existing: ReadonlyArray<T>,
  addition: T,
): ReadonlyArray<T> {
  const next = [...existing, addition];
  Object.freeze(next);
  return next;
}
