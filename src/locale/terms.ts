import { CslError } from "../core/errors.js";
import type { Term, TermForm, TermList, TermNumber } from "../core/types.js";
import { asElements } from "../compiler/xml.js";
import type { XmlElementNode, XmlNode } from "../compiler/xml-types.js";

const TERM_FORMS: readonly TermForm[] = ["long", "short", "verb", "verb-short", "symbol"];

const FORM_FALLBACKS: Record<TermForm, TermForm | null> = {
  long: null,
  short: "long",
  verb: "long",
  "verb-short": "verb",
  symbol: "short",
};

const isTermForm = (value: string): value is TermForm => TERM_FORMS.some((form) => form === value);

const textContent = (node: XmlElementNode): string =>
  node.children
    .filter((child): child is Extract<XmlNode, { kind: "text" }> => child.kind === "text")
    .map((child) => child.value)
    .join("");

const parseForm = (node: XmlElementNode): TermForm => {
  const raw = node.attributes.form;
  if (raw === undefined) {
    return "long";
  }
  if (!isTermForm(raw)) {
    throw new CslError("STYLE_TERM_FORM_INVALID", `Unknown term form "${raw}".`, node.location);
  }
  return raw;
};

const parseTerm = (node: XmlElementNode): Term[] => {
  const name = node.attributes.name;
  if (!name) {
    throw new CslError("STYLE_TERM_NAME_MISSING", '<term> requires a "name" attribute.', node.location);
  }
  const base = {
    name,
    form: parseForm(node),
    gender: node.attributes.gender ?? null,
    genderForm: node.attributes["gender-form"] ?? null,
    match: node.attributes.match ?? null,
  };
  const numbered = asElements(node.children);
  if (numbered.length === 0) {
    return [{ ...base, number: null, value: textContent(node) }];
  }
  return numbered.map((child): Term => {
    if (child.name !== "single" && child.name !== "multiple") {
      throw new CslError(
        "STYLE_UNKNOWN_ELEMENT",
        `<${child.name}> is not allowed inside <term>.`,
        child.location
      );
    }
    const number: TermNumber = child.name;
    return { ...base, number, value: textContent(child) };
  });
};

/** Parses the `term` children of a locale's `terms` element. */
export const parseTermList = (nodes: readonly XmlNode[]): TermList => {
  const terms: Term[] = [];
  for (const node of asElements(nodes)) {
    if (node.name !== "term") {
      throw new CslError("STYLE_UNKNOWN_ELEMENT", `<${node.name}> is not allowed inside <terms>.`, node.location);
    }
    terms.push(...parseTerm(node));
  }
  return terms;
};

const sameDefinition = (a: Term, b: Term): boolean =>
  a.name === b.name && a.form === b.form && a.genderForm === b.genderForm;

/** Returns `incoming` followed by every `existing` term it does not redefine. */
export const mergeTermLists = (incoming: TermList, existing: TermList): TermList => {
  const kept = existing.filter((term) => !incoming.some((other) => sameDefinition(term, other)));
  return [...incoming, ...kept];
};

export interface TermQuery {
  form?: TermForm;
  number?: TermNumber;
  genderForm?: string;
}

/** Finds a term, falling back through the CSL form chain (e.g. `verb-short` → `verb` → `long`). */
export const lookupTerm = (terms: TermList, name: string, query: TermQuery = {}): string | null => {
  let form: TermForm | null = query.form ?? "long";
  while (form !== null) {
    const current: TermForm = form;
    const candidates = terms.filter(
      (term) =>
        term.name === name &&
        term.form === current &&
        (query.genderForm === undefined || term.genderForm === null || term.genderForm === query.genderForm)
    );
    const exact = candidates.find((term) => term.number === (query.number ?? null));
    const found = exact ?? candidates.find((term) => term.number === null) ?? candidates[0];
    if (found) {
      return found.value;
    }
    form = FORM_FALLBACKS[current];
  }
  return null;
};
