import assert from "node:assert/strict";
import { test } from "vitest";

import {
  OPTION_DEFAULTS,
  applyOptionDefaults,
  bibFormattingParams,
  type OptionTarget,
} from "../../../src/compiler/options.js";
import { OptionMap } from "../../../src/core/option-map.js";
import type { Attrs } from "../../../src/core/types.js";
import { expectCode } from "../../helpers/assertions.js";

const makeTarget = (citeOptions: Record<string, string> = {}, citeLayoutAttrs: Attrs | null = { delimiter: "; " }) => {
  const target: OptionTarget = {
    options: new OptionMap(),
    bibOptions: new OptionMap(),
    citeOptions: new OptionMap(citeOptions),
    localeOptions: new OptionMap(),
    citeLayoutAttrs,
  };
  return target;
};

test("every default is filled and explicit values take precedence", () => {
  const target = makeTarget();
  target.bibOptions.set("hanging-indent", "true");
  applyOptionDefaults(target);

  for (const [scope, key] of OPTION_DEFAULTS) {
    assert.ok(target[scope].has(key), `${scope}.${key}`);
  }
  assert.equal(target.bibOptions.get("hanging-indent"), "true");
  assert.equal(target.bibOptions.get("line-spacing"), "1");
  assert.equal(target.citeOptions.get("near-note-distance"), "5");
  assert.equal(target.options.get("demote-non-dropping-particle"), "display-and-sort");
  assert.equal(target.localeOptions.get("punctuation-in-quote"), "false");
});

test("defaulting twice changes nothing", () => {
  const target = makeTarget({ collapse: "year-suffix-ranged" });
  applyOptionDefaults(target);
  const snapshot = (["options", "bibOptions", "citeOptions", "localeOptions"] as const).map((scope) =>
    target[scope].entries()
  );
  applyOptionDefaults(target);
  assert.deepEqual(
    (["options", "bibOptions", "citeOptions", "localeOptions"] as const).map((scope) => target[scope].entries()),
    snapshot
  );
});

test("year-suffix collapsing defaults its delimiters to the layout delimiter", () => {
  const target = makeTarget({ collapse: "year-suffix" });
  applyOptionDefaults(target);
  assert.equal(target.citeOptions.get("year-suffix-delimiter"), "; ");
  assert.equal(target.citeOptions.get("after-collapse-delimiter"), "; ");
  assert.equal(target.citeOptions.get("cite-group-delimiter"), ", ");
});

test("year collapsing leaves the year-suffix delimiter alone", () => {
  const target = makeTarget({ collapse: "year", "after-collapse-delimiter": " / " });
  applyOptionDefaults(target);
  assert.equal(target.citeOptions.has("year-suffix-delimiter"), false);
  assert.equal(target.citeOptions.get("after-collapse-delimiter"), " / ");
  assert.equal(target.citeOptions.get("cite-group-delimiter"), ", ");
});

test("citation-number collapsing sets none of the dependent delimiters", () => {
  const target = makeTarget({ collapse: "citation-number" });
  applyOptionDefaults(target);
  assert.equal(target.citeOptions.has("cite-group-delimiter"), false);
  assert.equal(target.citeOptions.has("after-collapse-delimiter"), false);
  assert.equal(target.citeOptions.has("year-suffix-delimiter"), false);
});

test("a layout without a delimiter defaults the collapse delimiters to empty", () => {
  const target = makeTarget({ collapse: "year-suffix" }, {});
  applyOptionDefaults(target);
  assert.equal(target.citeOptions.get("year-suffix-delimiter"), "");
  assert.equal(target.citeOptions.get("after-collapse-delimiter"), "");
});

test("bibliography options convert to typed formatting parameters", () => {
  const options = new OptionMap({
    "hanging-indent": "true",
    "line-spacing": "2",
    "entry-spacing": "1.5",
    "second-field-align": "flush",
    "subsequent-author-substitute": "---",
  });
  assert.deepEqual(bibFormattingParams(options), {
    hangingIndent: true,
    lineSpacing: 2,
    entrySpacing: 1.5,
    secondFieldAlign: "flush",
  });
});

test("second-field-align is carried as disabled when absent or false", () => {
  assert.deepEqual(bibFormattingParams(new OptionMap()), { secondFieldAlign: false });
  assert.deepEqual(bibFormattingParams(new OptionMap({ "second-field-align": "false", "hanging-indent": "false" })), {
    hangingIndent: false,
    secondFieldAlign: false,
  });
  assert.equal(bibFormattingParams(new OptionMap({ "second-field-align": "margin" })).secondFieldAlign, "margin");
});

test("out-of-domain bibliography values are option-value errors", () => {
  expectCode(() => bibFormattingParams(new OptionMap({ "line-spacing": "wide" })), "OPTION_VALUE_INVALID");
  expectCode(() => bibFormattingParams(new OptionMap({ "entry-spacing": "" })), "OPTION_VALUE_INVALID");
  expectCode(() => bibFormattingParams(new OptionMap({ "entry-spacing": "true" })), "OPTION_VALUE_INVALID");
  expectCode(() => bibFormattingParams(new OptionMap({ "hanging-indent": "2" })), "OPTION_VALUE_INVALID");
  expectCode(() => bibFormattingParams(new OptionMap({ "second-field-align": "true" })), "OPTION_VALUE_INVALID");
  expectCode(() => bibFormattingParams(new OptionMap({ "second-field-align": "flush-left" })), "OPTION_VALUE_INVALID");
});
