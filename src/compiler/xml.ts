import { SaxesParser } from "saxes";

import { CslError } from "../core/errors.js";
import type { SourceSpan } from "../core/types.js";
import type { XmlDocument, XmlElementNode, XmlNode } from "./xml-types.js";

interface MutableElement {
  kind: "element";
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
  location: SourceSpan;
}

const normalizeLoc = (line: number, column: number) => {
  return {
    line: Math.max(1, line),
    column: Math.max(1, column),
  };
};

/**
 * Parses XML text. Comments are kept as `comment` nodes; see `stripComments`.
 * Empty or whitespace-only input raises `XML_EMPTY`, malformed XML `XML_PARSE_ERROR`.
 */
export const parseXmlDocument = (source: string): XmlDocument => {
  if (source.trim().length === 0) {
    throw new CslError("XML_EMPTY", "XML document is empty.");
  }
  const parser = new SaxesParser({ xmlns: false });
  const stack: MutableElement[] = [];
  let root: MutableElement | null = null;
  let parseErrorMessage: string | null = null;

  parser.on("error", (error) => {
    parseErrorMessage = String(error);
  });

  parser.on("opentag", (tag) => {
    const start = normalizeLoc(parser.line, parser.column);
    const node: MutableElement = {
      kind: "element",
      name: tag.name,
      attributes: Object.fromEntries(
        Object.entries(tag.attributes).map(([k, v]) => [k, String(v)])
      ),
      children: [],
      location: {
        start,
        end: start,
      },
    };
    stack.push(node);
  });

  const appendText = (value: string): void => {
    if (stack.length === 0) {
      return;
    }
    const end = normalizeLoc(parser.line, parser.column);
    stack[stack.length - 1].children.push({
      kind: "text",
      value,
      location: {
        start: end,
        end,
      },
    });
  };

  parser.on("text", (value) => {
    if (value.trim().length > 0) {
      appendText(value);
    }
  });

  // CDATA is kept verbatim, whitespace included.
  parser.on("cdata", (value) => {
    if (value.length > 0) {
      appendText(value);
    }
  });

  parser.on("comment", (value) => {
    if (stack.length === 0) {
      return;
    }
    const end = normalizeLoc(parser.line, parser.column);
    stack[stack.length - 1].children.push({
      kind: "comment",
      value,
      location: {
        start: end,
        end,
      },
    });
  });

  parser.on("closetag", () => {
    const node = stack.pop();
    if (!node) {
      return;
    }
    node.location.end = normalizeLoc(parser.line, parser.column);
    if (stack.length === 0) {
      root = node;
      return;
    }
    stack[stack.length - 1].children.push(node);
  });

  parser.write(source).close();

  if (parseErrorMessage) {
    throw new CslError("XML_PARSE_ERROR", parseErrorMessage);
  }

  if (!root) {
    throw new CslError("XML_PARSE_ERROR", "XML document has no root element.");
  }

  return { root };
};

export const stripComments = (node: XmlElementNode): XmlElementNode => {
  const children: XmlNode[] = [];
  for (const child of node.children) {
    if (child.kind === "comment") {
      continue;
    }
    children.push(child.kind === "element" ? stripComments(child) : child);
  }
  return { ...node, children };
};

export const asElements = (nodes: readonly XmlNode[]): XmlElementNode[] => {
  return nodes.filter((n): n is XmlElementNode => n.kind === "element");
};
