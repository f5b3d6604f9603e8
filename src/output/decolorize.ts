const ANSI_ESCAPE = /\x1B\[[0-9;]*[a-zA-Z]/g;

/** Removes terminal color and cursor escape sequences. */
export function decolorize(text: string): string {
  // removing one sequence can join the halves of another, so strip until nothing matches
  let current = text;
  let previous: string;
  do {
    previous = current;
    current = previous.replace(ANSI_ESCAPE, "");
  } while (current !== previous);
  return current;
}
