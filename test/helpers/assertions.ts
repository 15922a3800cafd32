import assert from "node:assert/strict";

import { stripComments, parseXmlDocument } from "../../src/compiler/xml.js";
import type { XmlElementNode } from "../../src/compiler/xml-types.js";
import { CslError } from "../../src/core/errors.js";

export const expectCode = (fn: () => unknown, code: string): void => {
  assert.throws(fn, (error: unknown) => {
    assert.ok(error instanceof CslError);
    assert.equal(error.code, code);
    return true;
  });
};

export const element = (xml: string): XmlElementNode => stripComments(parseXmlDocument(xml).root);
