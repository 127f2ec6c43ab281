import { parse, stringify } from "yaml";

export type Frontmatter = Record<string, unknown>;

export type FrontmatterParseResult = {
  frontmatter: Frontmatter;
  body: string;
  hasFrontmatter: boolean;
};

export const FRONTMATTER_DELIMITER = "---";

export class FrontmatterShapeError extends Error {
  constructor() {
    super("Front matter must deserialize to a mapping");
    this.name = "FrontmatterShapeError";
  }
}

export function isFrontmatter(value: unknown): value is Frontmatter {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Split a document into YAML front matter and body.
 *
 * A first line of `---` opens a block. It closes at the next unindented
 * `---` line, so indented `---` lines inside block scalars stay in the
 * YAML. Without a closing delimiter the whole text is returned as body.
 * The blank line that separates the block from the body is dropped.
 */
export function parseFrontmatter(text: string): FrontmatterParseResult {
  const lines = text.split("\n");
  if (lines.length === 0 || lines[0].trim() !== FRONTMATTER_DELIMITER) {
    return { frontmatter: {}, body: text, hasFrontmatter: false };
  }

  let endIndex = -1;
  for (let index = 1; index < lines.length; index += 1) {
    if (isClosingDelimiter(lines[index])) {
      endIndex = index;
      break;
    }
  }
  if (endIndex === -1) {
    return { frontmatter: {}, body: ensureTrailingNewline(text), hasFrontmatter: false };
  }

  const block = lines.slice(1, endIndex).join("\n").trim();
  const parsed: unknown = block ? parse(block) : {};
  const frontmatter = parsed === null || parsed === undefined ? {} : parsed;
  if (!isFrontmatter(frontmatter)) {
    throw new FrontmatterShapeError();
  }

  const rest = lines.slice(endIndex + 1);
  if (rest.length > 0 && rest[0] === "") {
    rest.shift();
  }
  const body = rest.join("\n");
  return {
    frontmatter,
    body: body ? ensureTrailingNewline(body) : body,
    hasFrontmatter: true
  };
}

function isClosingDelimiter(line: string): boolean {
  return line === FRONTMATTER_DELIMITER || line === `${FRONTMATTER_DELIMITER}\r`;
}

export function serializeFrontmatter(frontmatter: Frontmatter): string {
  const yaml = stringify(frontmatter, { sortMapEntries: true }).trim();
  return `${FRONTMATTER_DELIMITER}\n${yaml}\n${FRONTMATTER_DELIMITER}`;
}

/** Join front matter and body; no block is written for empty front matter. */
export function composeDocument(frontmatter: Frontmatter, body: string): string {
  const normalizedBody = ensureTrailingNewline(body);
  if (Object.keys(frontmatter).length === 0) {
    return normalizedBody;
  }
  return `${serializeFrontmatter(frontmatter)}\n\n${normalizedBody}`;
}

export function ensureTrailingNewline(value: string): string {
  return value.endsWith("\n") ? value : `${value}\n`;
}
