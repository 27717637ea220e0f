/**
 * Attribute names and values the classifier compares against.
 */
const METHOD_LABEL = "METHOD";
const OPERATOR_PREFIX = "<operator>";
const SYNTHETIC_METHOD_NAMES: ReadonlySet<string> = new Set([
  "<clinit>",
  "<global>",
]);
const NON_SOURCE_FILENAMES: ReadonlySet<string> = new Set([
  "<includes>",
  "<empty>",
  "",
]);
const INCLUDES_MARKER = "<includes>";

export type AttributeLookup = Pick<ReadonlyMap<string, string>, "get">;

/**
 * True when a node is a METHOD written by the user: not external, not a
 * compiler-synthesized operator or initializer, and backed by a real source
 * file rather than an include or an empty placeholder.
 *
 * Missing attributes compare as "", except `IS_EXTERNAL` which defaults
 * to "false".
 */
export function isUserDefinedFunction(attributes: AttributeLookup): boolean {
  if (attributes.get("label") !== METHOD_LABEL) {
    return false;
  }

  const isExternal = attributes.get("IS_EXTERNAL") ?? "false";
  if (isExternal.toLowerCase() === "true") {
    return false;
  }

  const name = attributes.get("NAME") ?? "";
  const fullName = attributes.get("FULL_NAME") ?? "";
  if (name.startsWith(OPERATOR_PREFIX) || fullName.startsWith(OPERATOR_PREFIX)) {
    return false;
  }
  if (SYNTHETIC_METHOD_NAMES.has(name)) {
    return false;
  }

  const filename = attributes.get("FILENAME") ?? "";
  if (NON_SOURCE_FILENAMES.has(filename)) {
    return false;
  }

  const astParent = attributes.get("AST_PARENT_FULL_NAME") ?? "";
  return !astParent.includes(INCLUDES_MARKER);
}

export function isMethodNode(attributes: AttributeLookup): boolean {
  return attributes.get("label") === METHOD_LABEL;
}
