import { CslError } from "../core/errors.js";
import type { Attrs, NamesSpec, RenderContext, RenderFn, Rendered } from "../core/types.js";
import { compileRenderNode } from "./render-compiler.js";
import { asElements } from "./xml.js";
import type { XmlElementNode } from "./xml-types.js";

type Substitution =
  | { kind: "names"; variables: string[]; spec: NamesSpec }
  | { kind: "element"; render: RenderFn };

interface NamesChildren {
  nameAttrs: Attrs | null;
  nameParts: Map<string, Attrs>;
  etAlAttrs: Attrs | null;
  labelAttrs: Attrs | null;
  substitute: XmlElementNode | null;
}

const EMPTY_ATTRS: Attrs = Object.freeze({});

const EMPTY_VARS: Rendered = { content: null, kind: "empty-vars" };

const parseVariables = (node: XmlElementNode): string[] => {
  const raw = node.attributes.variable;
  const variables = raw === undefined ? [] : raw.split(/\s+/).filter(Boolean);
  if (variables.length === 0) {
    throw new CslError(
      "STYLE_NAMES_VARIABLE_MISSING",
      '<names> requires a non-empty "variable" attribute.',
      node.location
    );
  }
  return variables;
};

const scanChildren = (node: XmlElementNode): NamesChildren => {
  const scanned: NamesChildren = {
    nameAttrs: null,
    nameParts: new Map(),
    etAlAttrs: null,
    labelAttrs: null,
    substitute: null,
  };
  for (const child of asElements(node.children)) {
    switch (child.name) {
      case "name":
        scanned.nameAttrs = Object.freeze({ ...child.attributes });
        for (const part of asElements(child.children)) {
          const partName = part.attributes.name;
          if (part.name !== "name-part" || !partName) {
            throw new CslError(
              "STYLE_NAME_PART_INVALID",
              '<name> may only contain <name-part> elements with a "name" attribute.',
              part.location
            );
          }
          scanned.nameParts.set(partName, Object.freeze({ ...part.attributes }));
        }
        break;
      case "et-al":
        scanned.etAlAttrs = Object.freeze({ ...child.attributes });
        break;
      case "label":
        scanned.labelAttrs = Object.freeze({ ...child.attributes });
        break;
      case "substitute":
        scanned.substitute = child;
        break;
      default:
        throw new CslError(
          "STYLE_UNKNOWN_ELEMENT",
          `<${child.name}> is not allowed inside <names>.`,
          child.location
        );
    }
  }
  return scanned;
};

const buildSpec = (node: XmlElementNode, scanned: NamesChildren, inherited: NamesSpec | null): NamesSpec => {
  const ownsNameForm = scanned.nameAttrs !== null || scanned.labelAttrs !== null;
  if (inherited && !ownsNameForm) {
    return {
      ...inherited,
      namesAttrs: Object.freeze({ ...node.attributes }),
      etAlAttrs: scanned.etAlAttrs ?? inherited.etAlAttrs,
    };
  }
  if (!ownsNameForm) {
    throw new CslError(
      "STYLE_NAMES_LABEL_ORDER",
      "<names> must contain a <name> or <label> element to fix the label position.",
      node.location
    );
  }
  return {
    namesAttrs: Object.freeze({ ...node.attributes }),
    nameAttrs: scanned.nameAttrs ?? EMPTY_ATTRS,
    nameParts: scanned.nameParts,
    etAlAttrs: scanned.etAlAttrs ?? EMPTY_ATTRS,
    labelAttrs: scanned.labelAttrs,
    labelBeforeNames: scanned.labelAttrs === null,
  };
};

const compileSubstitutions = (substitute: XmlElementNode | null, outer: NamesSpec): Substitution[] => {
  if (!substitute) {
    return [];
  }
  return asElements(substitute.children).map((child): Substitution => {
    if (child.name !== "names") {
      return { kind: "element", render: compileRenderNode(child) };
    }
    const scanned = scanChildren(child);
    if (scanned.substitute) {
      throw new CslError(
        "STYLE_NESTED_SUBSTITUTE",
        "<names> inside <substitute> cannot declare its own <substitute>.",
        scanned.substitute.location
      );
    }
    return {
      kind: "names",
      variables: parseVariables(child),
      spec: buildSpec(child, scanned, outer),
    };
  });
};

const isEmpty = (rendered: Rendered): boolean => rendered.content === null || rendered.content === "";

const renderSubstitution = (substitution: Substitution, context: RenderContext): Rendered => {
  if (substitution.kind === "names") {
    return context.runtime.renderNameVars(substitution.variables, substitution.spec, context);
  }
  return substitution.render(context);
};

/**
 * Compiles a `names` element. Substitutions are alternatives tried in order
 * until one renders something; later ones are never evaluated.
 */
export const compileNames = (node: XmlElementNode): RenderFn => {
  const variables = parseVariables(node);
  const scanned = scanChildren(node);
  const spec = buildSpec(node, scanned, null);
  const substitutions = compileSubstitutions(scanned.substitute, spec);
  const countOnly = spec.nameAttrs.form === "count";

  const renderNames = (context: RenderContext): Rendered => {
    const primary = context.runtime.renderNameVars(variables, spec, context);
    if (!isEmpty(primary)) {
      return primary;
    }
    for (const substitution of substitutions) {
      const rendered = renderSubstitution(substitution, context);
      if (!isEmpty(rendered)) {
        return { ...rendered, substituted: true };
      }
    }
    return EMPTY_VARS;
  };

  return (context) => {
    if (context.runtime.isAuthorSuppressed(context)) {
      return EMPTY_VARS;
    }
    const result = renderNames(context);
    if (!countOnly) {
      return result;
    }
    const count = context.runtime.countNames(result.content);
    return { ...result, content: count > 0 ? String(count) : "" };
  };
};
