const LINE_BREAK = /\r\n|\r|\n/;

/**
 * Lines of a turn's text that are worth synthesizing: trimmed, blank ones dropped.
 * The result is lazy and can be iterated any number of times.
 */
export function splitLines(rawText: string): Iterable<string> {
  return {
    *[Symbol.iterator]() {
      for (const line of (rawText || '').split(LINE_BREAK)) {
        const trimmed = line.trim();
        if (trimmed) {
          yield trimmed;
        }
      }
    },
  };
}
