import { CslError } from "../core/errors.js";
import type { OptionMap, ReadonlyOptionMap } from "../core/option-map.js";
import type { Attrs } from "../core/types.js";

export type OptionScope = "options" | "bibOptions" | "citeOptions" | "localeOptions";

export type OptionTarget = Readonly<Record<OptionScope, OptionMap>> & {
  readonly citeLayoutAttrs: Attrs | null;
};

export const OPTION_DEFAULTS: ReadonlyArray<readonly [OptionScope, string, string]> = [
  ["citeOptions", "near-note-distance", "5"],
  ["localeOptions", "punctuation-in-quote", "false"],
  ["localeOptions", "limit-day-ordinals-to-day-1", "false"],
  ["bibOptions", "hanging-indent", "false"],
  ["bibOptions", "line-spacing", "1"],
  ["bibOptions", "entry-spacing", "1"],
  ["options", "initialize-with-hyphen", "true"],
  ["options", "demote-non-dropping-particle", "display-and-sort"],
];

const YEAR_SUFFIX_COLLAPSES = new Set(["year-suffix", "year-suffix-ranged"]);

const applyCollapseDefaults = (target: OptionTarget): void => {
  const cite = target.citeOptions;
  const collapse = cite.get("collapse");
  if (collapse === undefined || collapse === "citation-number") {
    return;
  }
  const layoutDelimiter = target.citeLayoutAttrs?.delimiter ?? "";
  cite.setDefault("cite-group-delimiter", ", ");
  cite.setDefault("after-collapse-delimiter", layoutDelimiter);
  if (YEAR_SUFFIX_COLLAPSES.has(collapse)) {
    cite.setDefault("year-suffix-delimiter", layoutDelimiter);
  }
};

/**
 * Fills every option the style left unset. Runs after the whole style is
 * read; the collapse-driven delimiters need the citation layout attributes.
 */
export const applyOptionDefaults = (target: OptionTarget): void => {
  for (const [scope, key, value] of OPTION_DEFAULTS) {
    target[scope].setDefault(key, value);
  }
  applyCollapseDefaults(target);
};

export type SecondFieldAlign = "flush" | "margin";

export interface BibFormattingParams {
  hangingIndent?: boolean;
  lineSpacing?: number;
  entrySpacing?: number;
  secondFieldAlign: SecondFieldAlign | false;
}

type FormattingValue = boolean | number | SecondFieldAlign;

const convertValue = (key: string, raw: string): FormattingValue => {
  switch (raw) {
    case "true":
      return true;
    case "false":
      return false;
    case "flush":
    case "margin":
      return raw;
    default: {
      const parsed = raw.trim() === "" ? Number.NaN : Number(raw);
      if (!Number.isFinite(parsed)) {
        throw new CslError("OPTION_VALUE_INVALID", `Bibliography option "${key}" has invalid value "${raw}".`);
      }
      return parsed;
    }
  }
};

const invalidValue = (key: string, raw: string, expected: string): CslError =>
  new CslError("OPTION_VALUE_INVALID", `Bibliography option "${key}" must be ${expected}, got "${raw}".`);

/** Converts the layout-affecting bibliography options into typed values. */
export const bibFormattingParams = (bibOptions: ReadonlyOptionMap): BibFormattingParams => {
  const params: BibFormattingParams = { secondFieldAlign: false };

  const hangingIndent = bibOptions.get("hanging-indent");
  if (hangingIndent !== undefined) {
    const value = convertValue("hanging-indent", hangingIndent);
    if (typeof value !== "boolean") {
      throw invalidValue("hanging-indent", hangingIndent, '"true" or "false"');
    }
    params.hangingIndent = value;
  }

  for (const [key, field] of [
    ["line-spacing", "lineSpacing"],
    ["entry-spacing", "entrySpacing"],
  ] as const) {
    const raw = bibOptions.get(key);
    if (raw === undefined) {
      continue;
    }
    const value = convertValue(key, raw);
    if (typeof value !== "number") {
      throw invalidValue(key, raw, "a number");
    }
    params[field] = value;
  }

  const secondFieldAlign = bibOptions.get("second-field-align");
  if (secondFieldAlign !== undefined) {
    const value = convertValue("second-field-align", secondFieldAlign);
    if (value === true || typeof value === "number") {
      throw invalidValue("second-field-align", secondFieldAlign, '"flush", "margin" or "false"');
    }
    params.secondFieldAlign = value;
  }

  return params;
};
