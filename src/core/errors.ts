import type { SourceSpan } from "./types.js";

export type CslErrorKind = "input" | "parse" | "structure" | "option-value";

const KIND_BY_PREFIX: Array<[string, CslErrorKind]> = [
  ["INPUT_", "input"],
  ["XML_", "parse"],
  ["STYLE_", "structure"],
  ["OPTION_", "option-value"],
];

export class CslError extends Error {
  readonly code: string;
  readonly span?: SourceSpan;

  constructor(code: string, message: string, span?: SourceSpan) {
    super(message);
    this.name = "CslError";
    this.code = code;
    this.span = span;
  }

  get kind(): CslErrorKind {
    for (const [prefix, kind] of KIND_BY_PREFIX) {
      if (this.code.startsWith(prefix)) {
        return kind;
      }
    }
    return "structure";
  }
}
