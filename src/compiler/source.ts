import fs from "node:fs";

import { CslError } from "../core/errors.js";
import type { XmlElementNode } from "./xml-types.js";
import { parseXmlDocument, stripComments } from "./xml.js";

const INLINE_XML_PATTERN = /^\s*</;
const YEAR_SUFFIX_VAR_PATTERN = /variable="year-suffix"/i;

export interface ParsedStyle {
  usesYearSuffixVar: boolean;
  root: XmlElementNode;
}

export const isInlineXml = (style: string): boolean => INLINE_XML_PATTERN.test(style);

/** Returns the style text, reading it from disk unless `style` already is XML. */
export const loadStyleSource = (style: string): string => {
  if (isInlineXml(style)) {
    return style;
  }
  try {
    return fs.readFileSync(style, "utf8");
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CslError(
      "INPUT_STYLE_UNREADABLE",
      `Style is neither inline XML nor a readable file: ${style} (${reason})`
    );
  }
};

export const usesYearSuffixVariable = (source: string): boolean =>
  YEAR_SUFFIX_VAR_PATTERN.test(source);

export const parseStyleSource = (source: string): ParsedStyle => {
  return {
    usesYearSuffixVar: usesYearSuffixVariable(source),
    root: stripComments(parseXmlDocument(source).root),
  };
};

export const parseStyle = (style: string): ParsedStyle => parseStyleSource(loadStyleSource(style));
