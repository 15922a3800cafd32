import type { XmlElementNode } from "../compiler/xml-types.js";
import type { ReadonlyOptionMap } from "./option-map.js";

export interface SourceLocation {
  line: number;
  column: number;
}

export interface SourceSpan {
  start: SourceLocation;
  end: SourceLocation;
}

export type Attrs = Readonly<Record<string, string>>;

export type RichText = string | RichTextSpan;

export interface RichTextSpan {
  attrs: Attrs;
  content: RichText[];
}

/**
 * How a rendered fragment relates to the item's variables. Group suppression
 * in the runtime relies on telling `empty-vars` apart from plain text.
 */
export type RenderKind = "text-only" | "empty-vars" | "present-var";

export interface Rendered {
  content: RichText | null;
  kind: RenderKind;
  /** Set when a `names` element fell back to one of its substitutions. */
  substituted?: boolean;
}

export type RenderFn = (context: RenderContext) => Rendered;

export type ChildRender = () => Rendered;

export type Primitive = (attrs: Attrs, context: RenderContext, children: ChildRender[]) => Rendered;

export type ElementTag =
  | "layout"
  | "text"
  | "date"
  | "date-part"
  | "number"
  | "label"
  | "group"
  | "choose"
  | "if"
  | "else-if"
  | "else"
  | "sort"
  | "key"
  | "macro";

export type PrimitiveName =
  | "renderLayout"
  | "renderText"
  | "renderDate"
  | "renderDatePart"
  | "renderNumber"
  | "renderLabel"
  | "renderGroup"
  | "renderChoose"
  | "renderIf"
  | "renderElseIf"
  | "renderElse"
  | "renderSort"
  | "renderKey"
  | "renderMacro";

export interface NamesSpec {
  namesAttrs: Attrs;
  nameAttrs: Attrs;
  nameParts: ReadonlyMap<string, Attrs>;
  etAlAttrs: Attrs;
  labelAttrs: Attrs | null;
  labelBeforeNames: boolean;
}

export type RenderRuntime = Record<PrimitiveName, Primitive> & {
  renderNameVars(variables: readonly string[], spec: NamesSpec, context: RenderContext): Rendered;
  countNames(content: RichText | null): number;
  isAuthorSuppressed(context: RenderContext): boolean;
};

export interface RenderContext {
  readonly runtime: RenderRuntime;
}

export interface DateFormat {
  attrs: Attrs;
  parts: ReadonlyMap<string, Attrs>;
}

export type TermForm = "long" | "short" | "verb" | "verb-short" | "symbol";

export type TermNumber = "single" | "multiple";

export interface Term {
  name: string;
  form: TermForm;
  number: TermNumber | null;
  gender: string | null;
  genderForm: string | null;
  match: string | null;
  value: string;
}

export type TermList = readonly Term[];

export interface CompiledStyle {
  readonly locale: string;
  readonly info: XmlElementNode | null;
  readonly options: ReadonlyOptionMap;
  readonly bibOptions: ReadonlyOptionMap;
  readonly citeOptions: ReadonlyOptionMap;
  readonly localeOptions: ReadonlyOptionMap;
  readonly citeLayout: RenderFn;
  readonly citeLayoutAttrs: Attrs;
  readonly citeSort: RenderFn | null;
  readonly citeSortOrders: readonly boolean[] | null;
  readonly bibLayout: RenderFn | null;
  readonly bibLayoutAttrs: Attrs | null;
  readonly bibSort: RenderFn | null;
  readonly bibSortOrders: readonly boolean[] | null;
  readonly citeNote: boolean;
  readonly usesYearSuffixVar: boolean;
  readonly dateText: DateFormat | null;
  readonly dateNumeric: DateFormat | null;
  readonly macros: ReadonlyMap<string, RenderFn>;
  readonly terms: TermList;
}
