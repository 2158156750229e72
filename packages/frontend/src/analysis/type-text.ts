/**
 * Small helpers for reading declared-type text without a type checker
 */

const OPENERS = new Set(["<", "(", "[", "{"]);
const CLOSERS = new Set([">", ")", "]", "}"]);

/**
 * Split on a separator character that sits outside brackets and quotes.
 */
export const splitTopLevel = (
  text: string,
  separator: string
): readonly string[] => {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | undefined;
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (quote !== undefined) {
      if (ch === "\\") {
        i++;
      } else if (ch === quote) {
        quote = undefined;
      }
      continue;
    }
    if (ch === '"' || ch === "'" || ch === "`") {
      quote = ch;
    } else if (OPENERS.has(ch)) {
      depth++;
    } else if (CLOSERS.has(ch) && !(ch === ">" && text.charAt(i - 1) === "=")) {
      depth--;
    } else if (ch === separator && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(text.slice(start));

  return parts.map((part) => part.trim());
};

/**
 * Index of the bracket closing the one at `open`, or -1.
 */
const findClosing = (text: string, open: number): number => {
  let depth = 0;
  for (let i = open; i < text.length; i++) {
    const ch = text.charAt(i);
    if (OPENERS.has(ch)) {
      depth++;
    } else if (CLOSERS.has(ch)) {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
};

/**
 * Remove whitespace and any parentheses wrapping the whole text.
 */
export const stripParens = (text: string): string => {
  let current = text.trim();
  while (
    current.startsWith("(") &&
    findClosing(current, 0) === current.length - 1
  ) {
    current = current.slice(1, -1).trim();
  }
  return current;
};

export type GenericReference = {
  readonly name: string;
  readonly args: readonly string[];
};

/**
 * Read `Name<A, B>` when the angle brackets enclose the rest of the text.
 */
export const matchGeneric = (text: string): GenericReference | undefined => {
  const open = text.indexOf("<");
  if (open <= 0 || !text.endsWith(">")) {
    return undefined;
  }
  const name = text.slice(0, open).trim();
  if (!isTypeName(name) || findClosing(text, open) !== text.length - 1) {
    return undefined;
  }
  return { name, args: splitTopLevel(text.slice(open + 1, -1), ",") };
};

/**
 * `Track`, `wire.Track`, `$Money`
 */
export const isTypeName = (text: string): boolean =>
  /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/.test(text);

export const isIdentifier = (text: string): boolean =>
  /^[A-Za-z_$][\w$]*$/.test(text);

export const isQualifiedBy = (name: string, namespace: string): boolean =>
  name.startsWith(`${namespace}.`);
