/**
 * Result type shared by every pass.
 *
 * A result always carries the messages produced while computing it, grouped
 * by severity; only successful results carry a value.
 */

export enum Severity {
  Error = "error",
  Warning = "warning",
  Info = "info",
  Debug = "debug",
}

export type MessagesBySeverity<E> = {
  [S in Severity]?: E[];
};

export type Result<T, E> =
  | { success: true; value: T; messages: MessagesBySeverity<E> }
  | { success: false; messages: MessagesBySeverity<E> };

interface HasSeverity {
  severity: Severity;
}

export namespace Result {
  export function ok<T, E = never>(value: T): Result<T, E> {
    return { success: true, value, messages: {} };
  }

  export function okWith<T, E extends HasSeverity>(
    value: T,
    messages: readonly E[],
  ): Result<T, E> {
    return { success: true, value, messages: group(messages) };
  }

  export function err<T, E extends HasSeverity>(
    error: E | E[],
  ): Result<T, E> {
    const errors: E[] = Array.isArray(error) ? error : [error];
    return { success: false, messages: group(errors) };
  }

  /**
   * Build a result from collected messages: failure if any error-severity
   * message is present, success with `value` otherwise.
   */
  export function fromMessages<T, E extends HasSeverity>(
    value: T,
    messages: readonly E[],
  ): Result<T, E> {
    const grouped = group(messages);
    if (grouped[Severity.Error]?.length) {
      return { success: false, messages: grouped };
    }
    return { success: true, value, messages: grouped };
  }

  export function map<T, U, E>(
    result: Result<T, E>,
    f: (value: T) => U,
  ): Result<U, E> {
    if (!result.success) {
      return result;
    }
    return { success: true, value: f(result.value), messages: result.messages };
  }

  export function errors<T, E>(result: Result<T, E>): E[] {
    return result.messages[Severity.Error] ?? [];
  }

  export function warnings<T, E>(result: Result<T, E>): E[] {
    return result.messages[Severity.Warning] ?? [];
  }

  export function hasErrors<T, E>(result: Result<T, E>): boolean {
    return errors(result).length > 0;
  }

  export function countBySeverity<T, E>(
    result: Result<T, E>,
    severity: Severity,
  ): number {
    return result.messages[severity]?.length ?? 0;
  }

  /**
   * All messages in severity order (errors first)
   */
  export function allMessages<T, E>(result: Result<T, E>): E[] {
    return [
      Severity.Error,
      Severity.Warning,
      Severity.Info,
      Severity.Debug,
    ].flatMap((severity) => result.messages[severity] ?? []);
  }

  /**
   * Combine message groups, keeping the order within each severity
   */
  export function merge<E>(
    ...groups: MessagesBySeverity<E>[]
  ): MessagesBySeverity<E> {
    const merged: MessagesBySeverity<E> = {};
    for (const messages of groups) {
      for (const severity of Object.values(Severity)) {
        const list = messages[severity];
        if (!list?.length) {
          continue;
        }
        merged[severity] = [...(merged[severity] ?? []), ...list];
      }
    }
    return merged;
  }

  function group<E extends HasSeverity>(
    messages: readonly E[],
  ): MessagesBySeverity<E> {
    const grouped: MessagesBySeverity<E> = {};
    for (const message of messages) {
      const list = grouped[message.severity] ?? [];
      list.push(message);
      grouped[message.severity] = list;
    }
    return grouped;
  }
}
