import type { StowError } from "#errors";
import { Result, Severity, type MessagesBySeverity } from "#result";
import { logger } from "#debug";

import type { Pass } from "./pass.js";

/**
 * Passes run one after another, each seeing everything added before it.
 * A failing pass stops the sequence; messages of earlier passes are kept.
 */
export class Sequence<Input, Output, E extends StowError> {
  private constructor(
    private readonly names: readonly string[],
    private readonly runner: (input: Input) => Promise<Result<Output, E>>,
  ) {}

  static of<Input>(): Sequence<Input, Input, never> {
    return new Sequence<Input, Input, never>([], async (input) =>
      Result.ok<Input, never>(input),
    );
  }

  then<Adds, PE extends StowError>(
    name: string,
    pass: Pass<{ needs: Output; adds: Adds; error: PE }>,
  ): Sequence<Input, Output & Adds, E | PE> {
    return new Sequence<Input, Output & Adds, E | PE>(
      [...this.names, name],
      async (input) => {
        const previous = await this.runner(input);
        if (!previous.success) {
          return previous;
        }

        logger.compile("running %s pass", name);
        const next = await pass.run(previous.value);
        const messages = merge<E | PE>(previous.messages, next.messages);
        if (!next.success) {
          return { success: false, messages };
        }
        return {
          success: true,
          value: { ...previous.value, ...next.value },
          messages,
        };
      },
    );
  }

  /**
   * Names of the passes, in order
   */
  get passes(): readonly string[] {
    return this.names;
  }

  execute(input: Input): Promise<Result<Output, E>> {
    return this.runner(input);
  }
}

export namespace Sequence {
  /**
   * Everything a sequence produces when it succeeds
   */
  export type Output<S> = S extends {
    execute(input: never): Promise<infer R>;
  }
    ? Extract<R, { success: true }> extends { value: infer V }
      ? V
      : never
    : never;
}

function merge<E extends StowError>(
  ...groups: MessagesBySeverity<E>[]
): MessagesBySeverity<E> {
  const merged: MessagesBySeverity<E> = {};
  for (const severity of [Severity.Error, Severity.Warning]) {
    const messages = groups.flatMap((group) => group[severity] ?? []);
    if (messages.length > 0) {
      merged[severity] = messages;
    }
  }
  return merged;
}
