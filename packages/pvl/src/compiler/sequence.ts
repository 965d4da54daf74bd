/**
 * Composition of passes into sequences
 */

import type { PvlError } from "#errors";
import { Result } from "#result";

/**
 * Run `next` on the value of a successful result. What `next` adds is
 * merged into the value, and the messages of both results are kept.
 */
export async function andThen<T extends object, U extends object, E1, E2>(
  result: Result<T, E1>,
  next: (value: T) => Promise<Result<U, E2>>,
): Promise<Result<T & U, E1 | E2>> {
  if (!result.success) {
    return result;
  }

  const added = await next(result.value);
  const messages = Result.merge<E1 | E2>(result.messages, added.messages);
  if (!added.success) {
    return { success: false, messages };
  }
  return {
    success: true,
    value: { ...result.value, ...added.value },
    messages,
  };
}

/**
 * Passes run in order; each sees the input together with everything the
 * passes before it added. The first failed result ends the sequence.
 */
export class Sequence<
  Input extends object,
  State extends object,
  E extends PvlError,
> {
  constructor(
    private readonly runner: (input: Input) => Promise<Result<State, E>>,
  ) {}

  then<A extends object, E2 extends PvlError>(
    pass: { run: (input: State) => Promise<Result<A, E2>> },
  ): Sequence<Input, State & A, E | E2> {
    return new Sequence(async (input: Input) =>
      andThen(await this.runner(input), (state) => pass.run(state)),
    );
  }

  run(input: Input): Promise<Result<State, E>> {
    return this.runner(input);
  }
}

export function buildSequence<Input extends object>(): Sequence<
  Input,
  Input,
  never
> {
  return new Sequence(async (input: Input) => Result.ok(input));
}
