/**
 * Descriptor generation: turns declared tools into the JSON-schema-like
 * descriptors offered to the model.
 */

import { JsonSchemaType } from "@toolchat/llm-client";
import type { ParameterSchema, ToolDescriptor } from "@toolchat/llm-client";
import { DocstringSyntaxError, parseDocstring } from "./docstring.js";
import type { DocParameter } from "./docstring.js";
import { SchemaGenerationError } from "./errors.js";
import type { ToolCollection, ToolSpec } from "./types.js";

// ---------------------------------------------------------------------------
// Type mapping
// ---------------------------------------------------------------------------

const NATIVE_TO_JSON_SCHEMA: ReadonlyMap<string, JsonSchemaType> = new Map([
  ["str", JsonSchemaType.STRING],
  ["string", JsonSchemaType.STRING],
  ["int", JsonSchemaType.INTEGER],
  ["integer", JsonSchemaType.INTEGER],
  ["float", JsonSchemaType.NUMBER],
  ["number", JsonSchemaType.NUMBER],
  ["bool", JsonSchemaType.BOOLEAN],
  ["boolean", JsonSchemaType.BOOLEAN],
  ["list", JsonSchemaType.ARRAY],
  ["array", JsonSchemaType.ARRAY],
  ["dict", JsonSchemaType.OBJECT],
  ["object", JsonSchemaType.OBJECT],
  ["None", JsonSchemaType.NULL],
  ["NoneType", JsonSchemaType.NULL],
  ["null", JsonSchemaType.NULL],
]);

/** Map a native or documented type name to a JSON schema type; unknown names become "string". */
export function jsonSchemaType(typeName: string | undefined): JsonSchemaType {
  if (typeName === undefined) return JsonSchemaType.STRING;
  return NATIVE_TO_JSON_SCHEMA.get(typeName.trim()) ?? JsonSchemaType.STRING;
}

// ---------------------------------------------------------------------------
// Documented type handling
// ---------------------------------------------------------------------------

/** Cut `text` at its first comma that is not inside braces. */
function cutAtTopLevelComma(text: string): string {
  let depth = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === "{") depth++;
    else if (ch === "}") depth = Math.max(0, depth - 1);
    else if (ch === "," && depth === 0) return text.slice(0, i).trim();
  }
  return text.trim();
}

const SET_ITEM = /^(?:"((?:[^"\\]|\\.)*)"|'((?:[^'\\]|\\.)*)'|(-?\d+(?:\.\d+)?))$/;

/** Split on commas outside quotes. */
function splitSetItems(inner: string): string[] {
  const items: string[] = [];
  let quote: string | undefined;
  let start = 0;
  for (let i = 0; i < inner.length; i++) {
    const ch = inner[i];
    if (quote) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = undefined;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === ",") {
      items.push(inner.slice(start, i));
      start = i + 1;
    }
  }
  items.push(inner.slice(start));
  return items.map((item) => item.trim());
}

/**
 * Parse a literal value set such as `{"celsius", "fahrenheit"}` or `{1, 2}`.
 * Returns the values as strings, or undefined when the text is not a
 * non-empty set of quoted strings and numbers.
 */
export function parseLiteralSet(text: string): string[] | undefined {
  const trimmed = text.trim();
  if (!trimmed.startsWith("{") || !trimmed.endsWith("}")) return undefined;

  const inner = trimmed.slice(1, -1).trim();
  if (inner.length === 0) return undefined;

  const values: string[] = [];
  for (const item of splitSetItems(inner)) {
    const match = SET_ITEM.exec(item);
    if (!match) return undefined;
    const [, doubleQuoted, singleQuoted, numeric] = match;
    const value = doubleQuoted ?? singleQuoted ?? numeric;
    if (value === undefined) return undefined;
    if (!values.includes(value)) values.push(value);
  }
  return values;
}

/** Resolve the schema of a documented parameter from its type text. */
function schemaFromDocumentedType(typeText: string): Pick<ParameterSchema, "type" | "enum"> {
  let text = typeText;
  if (text.includes("optional")) {
    text = cutAtTopLevelComma(text);
  }
  // Checked after the cut: `{"a", "b"}, optional` is an enum too.
  if (text.includes("{")) {
    const values = parseLiteralSet(text);
    if (values) {
      return { type: JsonSchemaType.STRING, enum: values };
    }
  }
  return { type: jsonSchemaType(text) };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Generate the descriptor for one tool.
 *
 * The documented type of a parameter wins over its native type. `required`
 * lists the parameters without a default, in declaration order.
 *
 * @throws SchemaGenerationError when the documentation is missing, has no
 *   summary, is malformed, or documents a parameter that is not declared.
 */
export function generateDescriptor(name: string, spec: ToolSpec): ToolDescriptor {
  if (typeof spec.doc !== "string" || spec.doc.trim().length === 0) {
    throw new SchemaGenerationError(name, "documentation is missing");
  }

  let summary: string[];
  let documented: DocParameter[];
  try {
    ({ summary, parameters: documented } = parseDocstring(spec.doc));
  } catch (err) {
    if (err instanceof DocstringSyntaxError) {
      throw new SchemaGenerationError(name, err.message, { cause: err });
    }
    throw err;
  }

  if (summary.length === 0) {
    throw new SchemaGenerationError(name, "documentation has no summary");
  }

  const declared = spec.params ?? [];
  for (const doc of documented) {
    if (!declared.some((param) => param.name === doc.name)) {
      throw new SchemaGenerationError(
        name,
        `documented parameter "${doc.name}" is not declared`,
      );
    }
  }

  const properties: Record<string, ParameterSchema> = {};
  const required: string[] = [];

  for (const param of declared) {
    const doc = documented.find((entry) => entry.name === param.name);

    let schema: ParameterSchema =
      doc && doc.type.length > 0
        ? schemaFromDocumentedType(doc.type)
        : { type: jsonSchemaType(param.type) };

    if (doc && doc.description.length > 0) {
      schema = { ...schema, description: doc.description.join("\n") };
    }

    properties[param.name] = schema;

    if (param.default === undefined) {
      required.push(param.name);
    }
  }

  return {
    type: "function",
    function: {
      name,
      description: summary.join("\n"),
      parameters: {
        type: "object",
        properties,
        ...(required.length > 0 ? { required } : {}),
      },
    },
  };
}

/** Member names of a collection that are exposed to the model, in key order. */
export function publicToolNames(collection: ToolCollection): string[] {
  return Object.keys(collection).filter((name) => !name.startsWith("_"));
}

/**
 * Generate descriptors for every public member of a collection.
 *
 * Fails fast: the first tool that cannot be described aborts the whole
 * catalog.
 */
export function generateDescriptors(collection: ToolCollection): ToolDescriptor[] {
  return publicToolNames(collection).map((name) => {
    const spec = collection[name];
    if (!spec) {
      throw new SchemaGenerationError(name, "tool is not defined");
    }
    return generateDescriptor(name, spec);
  });
}
