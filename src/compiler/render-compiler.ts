import { CslError } from "../core/errors.js";
import type {
  Attrs,
  ElementTag,
  PrimitiveName,
  RenderFn,
  Rendered,
} from "../core/types.js";
import { compileNames } from "./names.js";
import type { XmlElementNode, XmlNode } from "./xml-types.js";

export const PRIMITIVE_BY_TAG = {
  layout: "renderLayout",
  text: "renderText",
  date: "renderDate",
  "date-part": "renderDatePart",
  number: "renderNumber",
  label: "renderLabel",
  group: "renderGroup",
  choose: "renderChoose",
  if: "renderIf",
  "else-if": "renderElseIf",
  else: "renderElse",
  sort: "renderSort",
  key: "renderKey",
  macro: "renderMacro",
} as const satisfies Record<ElementTag, PrimitiveName>;

export const isElementTag = (name: string): name is ElementTag => Object.hasOwn(PRIMITIVE_BY_TAG, name);

export const constantRender = (value: string): RenderFn => {
  const rendered: Rendered = { content: value, kind: "text-only" };
  return () => rendered;
};

const compileElement = (node: XmlElementNode): RenderFn => {
  if (node.name === "names") {
    return compileNames(node);
  }
  if (!isElementTag(node.name)) {
    throw new CslError(
      "STYLE_UNKNOWN_ELEMENT",
      `<${node.name}> is not a renderable style element.`,
      node.location
    );
  }
  const primitive = PRIMITIVE_BY_TAG[node.name];
  const attrs: Attrs = Object.freeze({ ...node.attributes });
  const children = node.children.map(compileRenderNode);

  return (context) => {
    const thunks = children.map((child) => () => child(context));
    return context.runtime[primitive](attrs, context, thunks);
  };
};

/**
 * Translates a style fragment into a render function. Attributes are captured
 * now; the context, and with it the runtime primitives, arrive per call.
 */
export const compileRenderNode = (node: XmlNode): RenderFn => {
  switch (node.kind) {
    case "text":
      return constantRender(node.value);
    case "element":
      return compileElement(node);
    case "comment":
      throw new CslError(
        "STYLE_UNEXPECTED_COMMENT",
        "Comments must be stripped before compiling a style fragment.",
        node.location
      );
  }
};
