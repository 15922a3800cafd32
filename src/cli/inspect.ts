#!/usr/bin/env node

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { bibFormattingParams } from "../compiler/options.js";
import { compileStyle, type CompileStyleOptions } from "../compiler/style.js";
import { CslError } from "../core/errors.js";
import type { ReadonlyOptionMap } from "../core/option-map.js";
import type { CompiledStyle } from "../core/types.js";
import { createLocaleGetterFromDir } from "../locale/getter.js";

type WriteLine = (line: string) => void;

const usage = [
  "csl-inspect",
  "  <style> [--locale <id>] [--force-locale true|false] [--locales-dir <path>]",
].join("\n");

const makeCliError = (code: string, message: string): Error & { code: string } =>
  Object.assign(new Error(message), { code });

const parseArgs = (args: string[]): { style: string; flags: Record<string, string> } => {
  const flags: Record<string, string> = {};
  let style: string | null = null;
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token.startsWith("--")) {
      if (style !== null) {
        throw makeCliError("CLI_ARG_FORMAT", `Unexpected argument: ${token}`);
      }
      style = token;
      continue;
    }
    const name = token.slice(2);
    const value = args[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw makeCliError("CLI_ARG_MISSING", `Missing value for --${name}`);
    }
    flags[name] = value;
    i += 1;
  }
  if (style === null) {
    throw makeCliError("CLI_ARG_REQUIRED", "Missing style path or inline style XML.");
  }
  return { style, flags };
};

const parseBooleanFlag = (flags: Record<string, string>, name: string): boolean => {
  const raw = flags[name];
  if (raw === undefined || raw === "false") {
    return false;
  }
  if (raw === "true") {
    return true;
  }
  throw makeCliError("CLI_ARG_FORMAT", `--${name} must be "true" or "false".`);
};

const toCompileOptions = (flags: Record<string, string>): CompileStyleOptions => {
  const localesDir = flags["locales-dir"];
  return {
    locale: flags.locale,
    forceLocale: parseBooleanFlag(flags, "force-locale"),
    localeGetter: localesDir ? createLocaleGetterFromDir(path.resolve(localesDir)) : undefined,
  };
};

const formatSortOrders = (orders: readonly boolean[] | null): string =>
  orders === null ? "NONE" : orders.map((ascending) => (ascending ? "asc" : "desc")).join(",");

const emitOptions = (writeLine: WriteLine, scope: string, options: ReadonlyOptionMap): void => {
  const entries = options.entries().sort(([a], [b]) => a.localeCompare(b));
  for (const [key, value] of entries) {
    writeLine(`OPTION:${scope}|${key}|${JSON.stringify(value)}`);
  }
};

const emitStyle = (writeLine: WriteLine, style: CompiledStyle): number => {
  writeLine("RESULT:OK");
  writeLine(`LOCALE:${style.locale}`);
  writeLine(`YEAR_SUFFIX_VAR:${style.usesYearSuffixVar}`);
  writeLine(`CITE_NOTE:${style.citeNote}`);
  for (const name of [...style.macros.keys()].sort()) {
    writeLine(`MACRO:${name}`);
  }
  writeLine(`CITE_SORT:${formatSortOrders(style.citeSortOrders)}`);
  writeLine(`BIB_SORT:${formatSortOrders(style.bibSortOrders)}`);
  writeLine(`TERMS:${style.terms.length}`);
  emitOptions(writeLine, "style", style.options);
  emitOptions(writeLine, "citation", style.citeOptions);
  emitOptions(writeLine, "bibliography", style.bibOptions);
  emitOptions(writeLine, "locale", style.localeOptions);
  writeLine(`BIB_PARAMS_JSON:${JSON.stringify(bibFormattingParams(style.bibOptions))}`);
  return 0;
};

const emitError = (writeLine: WriteLine, error: unknown): number => {
  const code =
    error instanceof CslError
      ? error.code
      : typeof error === "object" && error !== null && "code" in error
        ? String(error.code)
        : "CLI_ERROR";
  const message = error instanceof Error ? error.message : "Unknown CLI error.";
  writeLine("RESULT:ERROR");
  writeLine(`ERROR_CODE:${code}`);
  writeLine(`ERROR_MSG_JSON:${JSON.stringify(message)}`);
  return 1;
};

export const runInspectCommand = (
  argv: string[],
  writeLine: WriteLine = (line) => process.stdout.write(`${line}\n`)
): number => {
  if (argv.length === 0 || argv[0] === "--help" || argv[0] === "-h") {
    writeLine(usage);
    return 0;
  }
  try {
    const { style, flags } = parseArgs(argv);
    return emitStyle(writeLine, compileStyle(style, toCompileOptions(flags)));
  } catch (error: unknown) {
    return emitError(writeLine, error);
  }
};

const realPath = (file: string): string => (fs.existsSync(file) ? fs.realpathSync(file) : file);

/** True when `argvPath` launches the module at `moduleUrl`, also through a symlinked bin. */
export const isEntryPoint = (moduleUrl: string, argvPath: string | undefined): boolean => {
  if (!argvPath) {
    return false;
  }
  return realPath(fileURLToPath(moduleUrl)) === realPath(path.resolve(argvPath));
};

/* v8 ignore next 3 */
if (isEntryPoint(import.meta.url, process.argv[1])) {
  process.exitCode = runInspectCommand(process.argv.slice(2));
}
