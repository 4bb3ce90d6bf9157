import { DwarfError, DwarfErrorCode, QueryResult } from "../../errors";

/** The DwarfError thrown by `fn`; fails the test when nothing or something else is thrown. */
export function thrownBy(fn: () => unknown): DwarfError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DwarfError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a DwarfError to be thrown");
}

export function codeOf(fn: () => unknown): DwarfErrorCode {
  return thrownBy(fn).code;
}

export function unwrap<T>(result: QueryResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

export function errorOf<T>(result: QueryResult<T>): DwarfError {
  if (result.ok) {
    throw new Error("expected the query to fail");
  }
  return result.error;
}
