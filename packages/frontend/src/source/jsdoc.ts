/**
 * `@wire` JSDoc tags
 */

import * as ts from "typescript";

export const WIRE_TAG = "wire";

/**
 * Text of every `@wire` tag on a node, joined with commas; undefined when
 * the node carries none. A bare `@wire` yields "".
 */
export const readWireTag = (node: ts.Node): string | undefined => {
  const tags = ts
    .getJSDocTags(node)
    .filter((tag) => tag.tagName.text === WIRE_TAG);
  if (tags.length === 0) {
    return undefined;
  }
  return tags
    .map((tag) => (ts.getTextOfJSDocComment(tag.comment) ?? "").trim())
    .filter((text) => text !== "")
    .join(", ");
};
