import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { pathToFileURL } from "node:url";

import { test } from "vitest";

import { isEntryPoint, runInspectCommand } from "../../../src/cli/inspect.js";

const STYLE = `<style class="note" version="1.0">
  <info><category citation-format="note"/></info>
  <macro name="title"><text variable="title"/></macro>
  <citation et-al-min="4">
    <layout><text macro="title"/></layout>
  </citation>
  <bibliography second-field-align="margin">
    <sort><key macro="title"/><key variable="issued" sort="descending"/></sort>
    <layout><text macro="title"/></layout>
  </bibliography>
</style>`;

const runWithCapture = (argv: string[]) => {
  const lines: string[] = [];
  const code = runInspectCommand(argv, (line) => lines.push(line));
  return { code, lines };
};

const writeStyle = (): string => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "csl-inspect-"));
  const file = path.join(dir, "note.csl");
  fs.writeFileSync(file, STYLE);
  return file;
};

test("inspect prints the compiled style summary", () => {
  const result = runWithCapture([writeStyle(), "--locale", "de-DE"]);
  assert.equal(result.code, 0);
  assert.deepEqual(result.lines.slice(0, 8), [
    "RESULT:OK",
    "LOCALE:de-DE",
    "YEAR_SUFFIX_VAR:false",
    "CITE_NOTE:true",
    "MACRO:title",
    "CITE_SORT:NONE",
    "BIB_SORT:asc,desc",
    "TERMS:0",
  ]);
  assert.ok(result.lines.includes('OPTION:style|class|"note"'));
  assert.ok(result.lines.includes('OPTION:citation|et-al-min|"4"'));
  assert.ok(result.lines.includes('OPTION:locale|punctuation-in-quote|"false"'));
  assert.equal(
    result.lines[result.lines.length - 1],
    'BIB_PARAMS_JSON:{"secondFieldAlign":"margin","hangingIndent":false,"lineSpacing":1,"entrySpacing":1}'
  );
});

test("inspect loads the external locale from a directory", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "csl-inspect-locales-"));
  fs.writeFileSync(
    path.join(dir, "locales-en-US.xml"),
    `<locale xml:lang="en-US"><terms><term name="and">and</term></terms></locale>`
  );
  const result = runWithCapture([writeStyle(), "--locales-dir", dir]);
  assert.equal(result.code, 0);
  assert.ok(result.lines.includes("LOCALE:en-US"));
  assert.ok(result.lines.includes("TERMS:1"));
});

test("inspect reports compile errors", () => {
  const result = runWithCapture([path.join(os.tmpdir(), "csl-inspect-missing.csl")]);
  assert.equal(result.code, 1);
  assert.equal(result.lines[0], "RESULT:ERROR");
  assert.equal(result.lines[1], "ERROR_CODE:INPUT_STYLE_UNREADABLE");
  assert.ok(result.lines[2]?.startsWith("ERROR_MSG_JSON:"));
});

test("inspect reports argument errors", () => {
  assert.equal(runWithCapture([writeStyle(), "--locale"]).lines[1], "ERROR_CODE:CLI_ARG_MISSING");
  assert.equal(runWithCapture(["a.csl", "b.csl"]).lines[1], "ERROR_CODE:CLI_ARG_FORMAT");
  assert.equal(runWithCapture(["--locale", "en-US"]).lines[1], "ERROR_CODE:CLI_ARG_REQUIRED");
  assert.equal(
    runWithCapture([writeStyle(), "--force-locale", "yes"]).lines[1],
    "ERROR_CODE:CLI_ARG_FORMAT"
  );
});

test("inspect prints usage", () => {
  const result = runWithCapture(["--help"]);
  assert.equal(result.code, 0);
  assert.equal(result.lines[0]?.split("\n")[0], "csl-inspect");
});

test("the entry check follows the symlink npm installs for the bin", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "csl-inspect-bin-"));
  const target = path.join(dir, "inspect.js");
  fs.writeFileSync(target, "");
  const link = path.join(dir, "csl-inspect");
  fs.symlinkSync(target, link);
  const other = path.join(dir, "other.js");
  fs.writeFileSync(other, "");

  const moduleUrl = pathToFileURL(target).href;
  assert.equal(isEntryPoint(moduleUrl, target), true);
  assert.equal(isEntryPoint(moduleUrl, link), true);
  assert.equal(isEntryPoint(moduleUrl, other), false);
  assert.equal(isEntryPoint(moduleUrl, undefined), false);
});
