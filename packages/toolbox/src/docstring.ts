/**
 * Parser for numpy-style tool documentation.
 *
 *   Look up the current weather for a city.
 *
 *   Parameters
 *   ----------
 *   city : str
 *       Name of the city.
 *   units : {"celsius", "fahrenheit"}, optional
 *       Unit system for temperatures.
 *
 * Only the summary paragraph and the Parameters section are extracted; other
 * sections (Returns, Raises, Notes, ...) are skipped.
 */

export interface DocParameter {
  name: string;
  /** Documented type text, empty when the entry names no type. */
  type: string;
  /** Description lines, trimmed. */
  description: string[];
}

export interface ParsedDocstring {
  /** Lines of the first paragraph, trimmed. */
  summary: string[];
  parameters: DocParameter[];
}

/** The documentation text does not follow the expected layout. */
export class DocstringSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DocstringSyntaxError";
  }
}

const UNDERLINE = /^-{3,}$/;
const PARAMETER_HEADER = /^([A-Za-z_$][\w$]*)(?:\s*:\s*(.*))?$/;
const PARAMETER_SECTIONS = new Set(["parameters", "params", "arguments", "args"]);

/**
 * Strip the indentation a template literal carries: the first line loses its
 * leading whitespace, later lines lose their common indentation, and blank
 * lines at either end are dropped.
 */
export function cleanDoc(doc: string): string[] {
  const [first = "", ...rest] = doc.replace(/\r\n?/g, "\n").split("\n");

  const indents = rest
    .filter((line) => line.trim().length > 0)
    .map((line) => line.length - line.trimStart().length);
  const margin = indents.length > 0 ? Math.min(...indents) : 0;

  const lines = [
    first.trim(),
    ...rest.map((line) => (line.trim().length > 0 ? line.slice(margin).trimEnd() : "")),
  ];

  while (lines.length > 0 && lines[0] === "") lines.shift();
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

function isSectionHeader(lines: readonly string[], index: number): boolean {
  const line = lines[index];
  const next = lines[index + 1];
  return (
    line !== undefined &&
    next !== undefined &&
    line.trim().length > 0 &&
    !line.startsWith(" ") &&
    UNDERLINE.test(next.trim())
  );
}

function parseParameterSection(body: readonly string[]): DocParameter[] {
  const parameters: DocParameter[] = [];
  let current: DocParameter | undefined;

  for (const line of body) {
    if (line.trim().length === 0) continue;

    if (/^\s/.test(line)) {
      if (!current) {
        throw new DocstringSyntaxError(
          `description line "${line.trim()}" does not follow a parameter entry`,
        );
      }
      current.description.push(line.trim());
      continue;
    }

    const match = PARAMETER_HEADER.exec(line.trim());
    if (!match) {
      throw new DocstringSyntaxError(`malformed parameter entry "${line.trim()}"`);
    }
    const [, name = "", type = ""] = match;
    if (parameters.some((p) => p.name === name)) {
      throw new DocstringSyntaxError(`parameter "${name}" is documented twice`);
    }
    current = { name, type: type.trim(), description: [] };
    parameters.push(current);
  }

  return parameters;
}

/**
 * Parse a documentation block into its summary and parameter entries.
 *
 * @throws DocstringSyntaxError when the Parameters section is malformed.
 */
export function parseDocstring(doc: string): ParsedDocstring {
  const lines = cleanDoc(doc);

  const summary: string[] = [];
  let index = 0;
  while (index < lines.length && !isSectionHeader(lines, index)) {
    const line = lines[index] ?? "";
    if (line.trim().length === 0) break;
    summary.push(line.trim());
    index++;
  }

  const parameters: DocParameter[] = [];
  for (; index < lines.length; index++) {
    if (!isSectionHeader(lines, index)) continue;

    const title = (lines[index] ?? "").trim().toLowerCase();
    let end = index + 2;
    while (end < lines.length && !isSectionHeader(lines, end)) end++;

    if (PARAMETER_SECTIONS.has(title)) {
      parameters.push(...parseParameterSection(lines.slice(index + 2, end)));
    }
    index = end - 1;
  }

  return { summary, parameters };
}
