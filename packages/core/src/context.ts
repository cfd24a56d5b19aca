// ============================================================================
// @hintpack/core — Conversion Context
// ============================================================================
//
// State carried through the walk. Each step receives a context and returns
// the one that follows it, so sibling and nested values observe exactly the
// key and position their predecessors left behind:
//
//   - currentKey is the last object key seen, never restored on leaving an
//     object.
//   - currentHint restarts at 0 on entering any array and is bumped after
//     each element. Nested arrays share it, so only the innermost open
//     array's position is meaningful.
// ============================================================================

export interface ConversionContext {
  readonly currentKey: string;
  readonly currentHint: number;
}

export const ROOT_CONTEXT: ConversionContext = Object.freeze({
  currentKey: '',
  currentHint: 0,
});

export function withKey(ctx: ConversionContext, key: string): ConversionContext {
  return { currentKey: key, currentHint: ctx.currentHint };
}

export function enterArray(ctx: ConversionContext): ConversionContext {
  return { currentKey: ctx.currentKey, currentHint: 0 };
}

export function nextPosition(ctx: ConversionContext): ConversionContext {
  return { currentKey: ctx.currentKey, currentHint: ctx.currentHint + 1 };
}
