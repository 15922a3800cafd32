import { CslError } from "../core/errors.js";
import { OptionMap } from "../core/option-map.js";
import type { Attrs, CompiledStyle, DateFormat, RenderFn, TermList } from "../core/types.js";
import { isLocaleCompatible } from "../locale/compat.js";
import { FALLBACK_LOCALE, type LocaleGetter } from "../locale/getter.js";
import { parseFragment, type ParsedFragment } from "./fragment.js";
import { mergeLocale, type LocaleTarget } from "./locale-merge.js";
import { applyOptionDefaults, type OptionTarget } from "./options.js";
import { compileRenderNode } from "./render-compiler.js";
import { parseStyle, type ParsedStyle } from "./source.js";
import { asElements } from "./xml.js";
import type { XmlElementNode } from "./xml-types.js";

export interface CompileStyleOptions {
  /** Locale to render in; the style's `default-locale` wins unless `forceLocale` is set. */
  locale?: string;
  forceLocale?: boolean;
  /** Supplies the external locale merged after the style's own locale blocks. */
  localeGetter?: LocaleGetter;
}

export const resolveStyleLocale = (root: XmlElementNode, options: CompileStyleOptions): string => {
  if (options.forceLocale && options.locale) {
    return options.locale;
  }
  return root.attributes["default-locale"] || options.locale || FALLBACK_LOCALE;
};

export const isNoteStyle = (info: XmlElementNode): boolean =>
  asElements(info.children).some(
    (child) => child.name === "category" && child.attributes["citation-format"] === "note"
  );

const localeLangOf = (locale: XmlElementNode): string | undefined =>
  locale.attributes["xml:lang"] ?? locale.attributes.lang;

class StyleBuilder implements LocaleTarget, OptionTarget {
  readonly options = new OptionMap();
  readonly bibOptions = new OptionMap();
  readonly citeOptions = new OptionMap();
  readonly localeOptions = new OptionMap();
  readonly macros = new Map<string, RenderFn>();
  info: XmlElementNode | null = null;
  citeNote = false;
  citation: ParsedFragment | null = null;
  bibliography: ParsedFragment | null = null;
  dateText: DateFormat | null = null;
  dateNumeric: DateFormat | null = null;
  terms: TermList | null = null;
  localeLoaded = false;

  constructor(
    readonly root: XmlElementNode,
    readonly locale: string,
    readonly usesYearSuffixVar: boolean
  ) {
    this.options.assign(root.attributes);
  }

  get citeLayoutAttrs(): Attrs | null {
    return this.citation?.layoutAttrs ?? null;
  }

  build(): CompiledStyle {
    const citation = this.citation;
    if (!citation) {
      throw new CslError("STYLE_CITATION_MISSING", "Style has no <citation> element.", this.root.location);
    }
    const bibliography = this.bibliography;
    return Object.freeze({
      locale: this.locale,
      info: this.info,
      options: this.options,
      bibOptions: this.bibOptions,
      citeOptions: this.citeOptions,
      localeOptions: this.localeOptions,
      citeLayout: citation.layout,
      citeLayoutAttrs: citation.layoutAttrs,
      citeSort: citation.sort,
      citeSortOrders: citation.sortOrders,
      bibLayout: bibliography?.layout ?? null,
      bibLayoutAttrs: bibliography?.layoutAttrs ?? null,
      bibSort: bibliography?.sort ?? null,
      bibSortOrders: bibliography?.sortOrders ?? null,
      citeNote: this.citeNote,
      usesYearSuffixVar: this.usesYearSuffixVar,
      dateText: this.dateText,
      dateNumeric: this.dateNumeric,
      macros: this.macros,
      terms: this.terms ?? [],
    });
  }
}

const compileMacro = (builder: StyleBuilder, node: XmlElementNode): void => {
  const name = node.attributes.name;
  if (!name) {
    throw new CslError("STYLE_MACRO_NAME_MISSING", '<macro> requires a "name" attribute.', node.location);
  }
  builder.macros.set(name, compileRenderNode({ ...node, attributes: {} }));
};

const updateStyle = (builder: StyleBuilder, child: XmlElementNode): void => {
  switch (child.name) {
    case "info":
      builder.info = child;
      builder.citeNote = isNoteStyle(child);
      break;
    case "locale":
      if (!builder.localeLoaded && isLocaleCompatible(localeLangOf(child), builder.locale)) {
        mergeLocale(builder, child, "override");
        builder.localeLoaded = true;
      }
      break;
    case "citation":
      builder.citation = parseFragment(child);
      builder.citeOptions.assign(builder.citation.options);
      break;
    case "bibliography":
      builder.bibliography = parseFragment(child);
      builder.bibOptions.assign(builder.bibliography.options);
      break;
    case "macro":
      compileMacro(builder, child);
      break;
    default:
      throw new CslError(
        "STYLE_UNKNOWN_ELEMENT",
        `<${child.name}> is not allowed directly inside <style>.`,
        child.location
      );
  }
};

/** Assembles a compiled style from an already parsed style tree. */
export const compileParsedStyle = (parsed: ParsedStyle, options: CompileStyleOptions = {}): CompiledStyle => {
  const { root } = parsed;
  if (root.name !== "style") {
    throw new CslError("STYLE_ROOT_INVALID", `Expected <style> root element, got <${root.name}>.`, root.location);
  }
  const builder = new StyleBuilder(root, resolveStyleLocale(root, options), parsed.usesYearSuffixVar);

  for (const child of asElements(root.children)) {
    updateStyle(builder, child);
  }
  if (options.localeGetter) {
    mergeLocale(builder, options.localeGetter(builder.locale), "fallback");
  }
  applyOptionDefaults(builder);

  return builder.build();
};

/**
 * Compiles a CSL style given as inline XML or as a path to a style file.
 *
 * @example
 * const style = compileStyle("styles/chicago-author-date.csl", {
 *   locale: "de-DE",
 *   localeGetter: createLocaleGetterFromDir("locales"),
 * });
 */
export const compileStyle = (style: string, options: CompileStyleOptions = {}): CompiledStyle =>
  compileParsedStyle(parseStyle(style), options);
