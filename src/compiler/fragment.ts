import { CslError } from "../core/errors.js";
import type { Attrs, RenderFn } from "../core/types.js";
import { compileRenderNode } from "./render-compiler.js";
import { asElements } from "./xml.js";
import type { XmlElementNode } from "./xml-types.js";

export interface ParsedFragment {
  options: Attrs;
  layout: RenderFn;
  layoutAttrs: Attrs;
  sort: RenderFn | null;
  sortOrders: boolean[] | null;
}

/** One flag per sort key; `true` means ascending. */
export const sortOrdersOf = (sort: XmlElementNode): boolean[] =>
  asElements(sort.children).map((key) => key.attributes.sort !== "descending");

/** Splits a `citation` or `bibliography` element into its options, sort and layout. */
export const parseFragment = (node: XmlElementNode): ParsedFragment => {
  const elements = asElements(node.children);
  const sortNode = elements[0]?.name === "sort" ? elements[0] : null;
  const layoutIndex = sortNode ? 1 : 0;
  const layoutNode = elements[layoutIndex];

  if (!layoutNode || layoutNode.name !== "layout") {
    throw new CslError(
      "STYLE_LAYOUT_MISSING",
      `<${node.name}> requires a <layout> element${sortNode ? " after <sort>" : ""}.`,
      layoutNode?.location ?? node.location
    );
  }
  const surplus = elements[layoutIndex + 1];
  if (surplus) {
    throw new CslError(
      "STYLE_FRAGMENT_SURPLUS_CHILD",
      `<${surplus.name}> is not allowed after the <layout> of <${node.name}>.`,
      surplus.location
    );
  }

  return {
    options: Object.freeze({ ...node.attributes }),
    layout: compileRenderNode(layoutNode),
    layoutAttrs: Object.freeze({ ...layoutNode.attributes }),
    sort: sortNode ? compileRenderNode(sortNode) : null,
    sortOrders: sortNode ? sortOrdersOf(sortNode) : null,
  };
};
