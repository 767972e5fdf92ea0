import { createBlockContext } from '@tfweave/block-core';

import type { BlockContext, BlockStream, SourceKind } from '@tfweave/block-core';

/** One definition source: a named, lazily-run producer of blocks. */
export interface BlockSource {
  name: string;
  kind: SourceKind;
  /** Lower runs earlier; ties fall back to name order. Defaults to 0. */
  priority?: number;
  /** Where the source came from, for messages. */
  origin?: string;
  produce(ctx: BlockContext): BlockStream;
}

/**
 * Uniform async view over a sync or async generator.
 * `next` resumes with an answer, `throw` raises a failure at the suspended `yield`.
 */
export interface ResumableProducer {
  next(answer?: unknown): Promise<IteratorResult<unknown, unknown>>;
  throw(error: unknown): Promise<IteratorResult<unknown, unknown>>;
  close(): Promise<void>;
}

function isAsyncStream(
  stream: BlockStream,
): stream is AsyncGenerator<unknown, unknown, unknown> {
  return Symbol.asyncIterator in stream;
}

export function startProducer(source: BlockSource): ResumableProducer {
  const stream = source.produce(createBlockContext(source.name, source.kind));
  if (isAsyncStream(stream)) {
    return {
      next: (answer) => stream.next(answer),
      throw: (error) => stream.throw(error),
      close: async () => {
        await stream.return(undefined);
      },
    };
  }
  return {
    next: async (answer) => stream.next(answer),
    throw: async (error) => stream.throw(error),
    close: async () => {
      stream.return(undefined);
    },
  };
}

export function compareSources(a: BlockSource, b: BlockSource): number {
  const byPriority = (a.priority ?? 0) - (b.priority ?? 0);
  if (byPriority !== 0) return byPriority;
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/** Discovery order: priority, then name. */
export function orderSources(sources: readonly BlockSource[]): BlockSource[] {
  return [...sources].sort(compareSources);
}
