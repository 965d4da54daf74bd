/**
 * Renderings of diagnostics
 */

import { positionOf, type PvlError } from "#errors";

export interface JsonMessage {
  severity: string;
  code: string;
  message: string;
  file: string;
  line?: number;
  column?: number;
}

export function formatJson(
  messages: readonly PvlError[],
  source: string,
  file: string,
): string {
  const entries = messages.map((error): JsonMessage => {
    const entry: JsonMessage = {
      severity: error.severity,
      code: error.code,
      message: error.message,
      file,
    };
    if (error.location) {
      const { line, column } = positionOf(source, error.location.offset);
      entry.line = line;
      entry.column = column;
    }
    return entry;
  });
  return JSON.stringify(entries, null, 2);
}
