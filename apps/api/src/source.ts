import type { Parser, Processor } from "@hookrelay/shared";

/**
 * A webhook endpoint: its parser plus the processors that turn the parser's events into
 * notifications. Mounted at /event/<key>.
 */
export type Source<TData = unknown> = {
  readonly key: string;
  readonly parser: Parser<TData>;
  readonly processors: readonly Processor<TData>[];
};

const sourceKeyPattern = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function defineSource<TData>(
  key: string,
  parser: Parser<TData>,
  ...processors: Processor<TData>[]
): Source<TData> {
  if (!sourceKeyPattern.test(key)) {
    throw new Error(`invalid source key "${key}": use letters, digits, ".", "_" or "-"`);
  }
  return { key, parser, processors };
}
