import type { OptionMap } from "../core/option-map.js";
import type { Attrs, DateFormat, TermList } from "../core/types.js";
import { mergeTermLists, parseTermList } from "../locale/terms.js";
import { asElements } from "./xml.js";
import type { XmlElementNode } from "./xml-types.js";

export type LocalePrecedence = "override" | "fallback";

export interface LocaleTarget {
  readonly localeOptions: OptionMap;
  dateText: DateFormat | null;
  dateNumeric: DateFormat | null;
  terms: TermList | null;
}

export const parseDateFormat = (node: XmlElementNode): DateFormat => {
  const parts = new Map<string, Attrs>();
  for (const part of asElements(node.children)) {
    const name = part.attributes.name;
    if (part.name === "date-part" && name) {
      parts.set(name, Object.freeze({ ...part.attributes }));
    }
  }
  return { attrs: Object.freeze({ ...node.attributes }), parts };
};

const mergeDate = (target: LocaleTarget, node: XmlElementNode): void => {
  if (node.attributes.form === "text") {
    target.dateText ??= parseDateFormat(node);
    return;
  }
  target.dateNumeric ??= parseDateFormat(node);
};

const mergeTerms = (target: LocaleTarget, node: XmlElementNode, precedence: LocalePrecedence): void => {
  const parsed = parseTermList(node.children);
  if (!target.terms) {
    target.terms = parsed;
    return;
  }
  target.terms =
    precedence === "override" ? mergeTermLists(parsed, target.terms) : mergeTermLists(target.terms, parsed);
};

/**
 * Merges a `locale` element into `target`. Style options never shadow ones
 * already present and each date form keeps its first definition. Terms from
 * the locale override existing ones under `override` precedence and only fill
 * gaps under `fallback`.
 */
export const mergeLocale = (
  target: LocaleTarget,
  locale: XmlElementNode,
  precedence: LocalePrecedence = "override"
): void => {
  for (const child of asElements(locale.children)) {
    switch (child.name) {
      case "style-options":
        target.localeOptions.extend(child.attributes);
        break;
      case "date":
        mergeDate(target, child);
        break;
      case "terms":
        mergeTerms(target, child, precedence);
        break;
      default:
        break;
    }
  }
};
