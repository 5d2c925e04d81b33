import path from "node:path";

export const IMAGE_EXTENSIONS = [".png", ".webp", ".gif", ".jpg", ".jpeg"];
export const AUDIO_EXTENSIONS = [".ogg", ".mp3", ".wav", ".opus", ".flac"];

const EMPHASIS_PATTERN = /\*\*(.+?)\*\*|\*([^*]+)\*|_([^_]+)_/g;
const INTERPOLATION_PATTERN = /(\[[^\]]*\])/;
const BRACE_TOKEN_PATTERN = /\{([^{}]+)\}/g;
const QUOTED_PATTERN = /(["'])((?:(?!\1).)*?)\1/g;

const endsWithAny = (value: string, extensions: string[]): boolean => {
  const lower = value.toLowerCase();
  return extensions.some((extension) => lower.endsWith(extension));
};

export const splitTextLines = (text: string): string[] =>
  text.split(/\r?\n/).filter((line) => line.trim().length > 0);

/** Backslash-escapes the characters Ren'Py treats specially inside say strings. */
export const escapeSayText = (text: string): string =>
  text.replace(/"/g, "\\\"").replace(/'/g, "\\'").replace(/%/g, "\\%");

const emphasize = (text: string): string =>
  text.replace(EMPHASIS_PATTERN, (_match, bold?: string, italic?: string, underline?: string) => {
    if (bold !== undefined) {
      return `{b}${emphasize(bold)}{/b}`;
    }
    if (italic !== undefined) {
      return `{i}${emphasize(italic)}{/i}`;
    }
    return `{u}${emphasize(underline ?? "")}{/u}`;
  });

/** Converts markdown emphasis to Ren'Py text tags outside `[...]` interpolations. */
export const applyEmphasis = (line: string): string =>
  line
    .split(INTERPOLATION_PATTERN)
    .map((part) => (part.startsWith("[") && part.endsWith("]") ? part : emphasize(part)))
    .join("");

export const renderSayText = (line: string, markdown: boolean): string => {
  const escaped = escapeSayText(line);
  return markdown ? applyEmphasis(escaped) : escaped;
};

/**
 * Rewrites `{name.png}` into a quoted path under `images/` relative to the
 * container directory. `../` climbs the container path but never above `images/`.
 */
export const inferBracedImagePaths = (line: string, containerDir: string): string =>
  line.replace(BRACE_TOKEN_PATTERN, (match, token: string) => {
    if (!endsWithAny(token.trim(), IMAGE_EXTENSIONS)) {
      return match;
    }
    let relative = path.posix.normalize(path.posix.join(containerDir || ".", token.trim()));
    while (relative.startsWith("../")) {
      relative = relative.slice(3);
    }
    return `'${path.posix.join("images", relative)}'`;
  });

export const findAssetReferences = (line: string): string[] => {
  const references: string[] = [];
  for (const match of line.matchAll(QUOTED_PATTERN)) {
    const candidate = match[2];
    if (endsWithAny(candidate, IMAGE_EXTENSIONS) || endsWithAny(candidate, AUDIO_EXTENSIONS)) {
      references.push(candidate);
    }
  }
  return references;
};

export const isMarkerLine = (line: string, markers: string[]): boolean => {
  const normalized = line.trimStart().toLowerCase();
  return markers.some((marker) => marker.length > 0 && normalized.startsWith(marker.toLowerCase()));
};

export interface CodeLineContext {
  containerDir: string;
  relativeImgsInBraces: boolean;
  knownAssets?: ReadonlySet<string>;
  markers: string[];
}

export interface RenderedCodeLine {
  line: string;
  problems: string[];
}

export const renderCodeLine = (line: string, context: CodeLineContext): RenderedCodeLine => {
  const problems: string[] = [];
  const rendered = context.relativeImgsInBraces ? inferBracedImagePaths(line, context.containerDir) : line;
  if (context.knownAssets) {
    for (const reference of findAssetReferences(rendered)) {
      if (!context.knownAssets.has(reference)) {
        problems.push(`references non-existent file "${reference}"`);
      }
    }
  }
  if (isMarkerLine(rendered, context.markers)) {
    problems.push(`contains the following line: ${rendered.trim()}`);
  }
  return { line: rendered, problems };
};

/**
 * Converts the authoring tool's expression syntax to Python:
 * `true/false`, `&&`, `||` and a negating `!`.
 */
export const toPythonExpression = (expression: string): string =>
  expression
    .replace(/\btrue\b/g, "True")
    .replace(/\bfalse\b/g, "False")
    .replace(/&&/g, " and ")
    .replace(/\|\|/g, " or ")
    .replace(/!(?!=)\s*/g, "not ")
    .replace(/[ \t]{2,}/g, " ")
    .trim();

export const toPythonStatements = (expression: string): string[] =>
  expression
    .replace(/[\r\n]+/g, " ")
    .split(";")
    .map((statement) => toPythonExpression(statement))
    .filter((statement) => statement.length > 0);

export const toPythonCondition = (expression: string): string =>
  toPythonExpression(expression.replace(/[\r\n]+/g, " "));
