import fs from "node:fs";
import path from "node:path";

import { parseStyleSource } from "../compiler/source.js";
import type { XmlElementNode } from "../compiler/xml-types.js";
import { CslError } from "../core/errors.js";

export type LocaleGetter = (locale: string) => XmlElementNode;

export const FALLBACK_LOCALE = "en-US";

const PRIMARY_DIALECTS: Readonly<Record<string, string>> = {
  af: "af-ZA",
  ar: "ar",
  bg: "bg-BG",
  ca: "ca-AD",
  cs: "cs-CZ",
  cy: "cy-GB",
  da: "da-DK",
  de: "de-DE",
  el: "el-GR",
  en: "en-US",
  es: "es-ES",
  et: "et-EE",
  eu: "eu",
  fa: "fa-IR",
  fi: "fi-FI",
  fr: "fr-FR",
  he: "he-IL",
  hr: "hr-HR",
  hu: "hu-HU",
  id: "id-ID",
  is: "is-IS",
  it: "it-IT",
  ja: "ja-JP",
  ko: "ko-KR",
  lt: "lt-LT",
  lv: "lv-LV",
  nb: "nb-NO",
  nl: "nl-NL",
  nn: "nn-NO",
  pl: "pl-PL",
  pt: "pt-PT",
  ro: "ro-RO",
  ru: "ru-RU",
  sk: "sk-SK",
  sl: "sl-SI",
  sr: "sr-RS",
  sv: "sv-SE",
  th: "th-TH",
  tr: "tr-TR",
  uk: "uk-UA",
  vi: "vi-VN",
  zh: "zh-CN",
};

export const expandLocale = (locale: string): string => PRIMARY_DIALECTS[locale] ?? locale;

export const localeFileName = (locale: string): string => `locales-${locale}.xml`;

const readLocaleFile = (dir: string, locale: string): XmlElementNode | null => {
  const file = path.join(dir, localeFileName(locale));
  if (!fs.existsSync(file)) {
    return null;
  }
  return parseStyleSource(fs.readFileSync(file, "utf8")).root;
};

/** Locale getter over a directory of `locales-<id>.xml` files, falling back to en-US. */
export const createLocaleGetterFromDir = (dir: string): LocaleGetter => {
  return (locale) => {
    const found = readLocaleFile(dir, expandLocale(locale)) ?? readLocaleFile(dir, FALLBACK_LOCALE);
    if (!found) {
      throw new CslError(
        "INPUT_LOCALE_NOT_FOUND",
        `No locale file for "${locale}" and no ${localeFileName(FALLBACK_LOCALE)} fallback in ${dir}.`
      );
    }
    return found;
  };
};
