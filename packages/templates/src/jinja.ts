import nunjucks from "nunjucks";
import { MalformedTemplateError } from "@promptweave/types";

const COMMENT = /\{#[\s\S]*?#\}/g;
const RAW_BLOCK = /\{%-?\s*(?:raw|verbatim)\s*-?%\}[\s\S]*?\{%-?\s*end(?:raw|verbatim)\s*-?%\}/g;
const TAG = /\{\{-?([\s\S]*?)-?\}\}|\{%-?([\s\S]*?)-?%\}/g;
const STRING_LITERAL = /"(?:\\.|[^"\\])*"|'(?:\\.|[^'\\])*'/g;
const TOKEN = /[A-Za-z_]\w*|\d[\w.]*|\S/g;
const IDENTIFIER = /^[A-Za-z_]\w*$/;

const RESERVED = new Set([
  "and", "or", "not", "in", "is", "if", "else",
  "true", "false", "none", "True", "False", "None",
  "loop", "caller", "super", "range", "cycler", "joiner", "lipsum",
]);

/** Tags whose arguments are names, not expressions that read variables. */
const NAME_ONLY_TAGS = new Set([
  "block", "endblock", "filter", "endfilter", "include", "extends", "endfor",
  "endif", "endset", "endmacro", "endcall", "else", "raw", "endraw",
]);

export const UNDEFINED_OUTPUT_MESSAGE = "attempted to output null or undefined value";

type JinjaLoader = ConstructorParameters<typeof nunjucks.Environment>[0];

export function createJinjaEnvironment(loader: JinjaLoader = null): nunjucks.Environment {
  return new nunjucks.Environment(loader, { autoescape: false, throwOnUndefined: true });
}

const inlineEnvironment = createJinjaEnvironment();

/** Compiles eagerly so syntax errors surface before any variables arrive. */
export function compileJinja(
  source: string,
  env: nunjucks.Environment = inlineEnvironment,
  filename?: string
): nunjucks.Template {
  try {
    return new nunjucks.Template(source, env, filename, true);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedTemplateError(source, reason, undefined, error);
  }
}

interface Expression {
  tokens: string[];
}

interface TemplateScan {
  locals: Set<string>;
  expressions: Expression[];
}

function tokenize(text: string): string[] {
  return Array.from(text.replace(STRING_LITERAL, " \"\" ").matchAll(TOKEN), (match) => match[0]);
}

function splitNames(tokens: string[]): string[] {
  return tokens.filter((token) => IDENTIFIER.test(token));
}

function scanTag(body: string, scan: TemplateScan): void {
  const tokens = tokenize(body);
  const [tag = "", ...rest] = tokens;

  if (NAME_ONLY_TAGS.has(tag)) {
    return;
  }

  switch (tag) {
    case "for": {
      const inIndex = rest.indexOf("in");
      for (const name of splitNames(rest.slice(0, inIndex < 0 ? rest.length : inIndex))) {
        scan.locals.add(name);
      }
      if (inIndex >= 0) {
        scan.expressions.push({ tokens: rest.slice(inIndex + 1) });
      }
      return;
    }
    case "set": {
      const assign = rest.indexOf("=");
      for (const name of splitNames(rest.slice(0, assign < 0 ? rest.length : assign))) {
        scan.locals.add(name);
      }
      if (assign >= 0) {
        scan.expressions.push({ tokens: rest.slice(assign + 1) });
      }
      return;
    }
    case "macro":
      for (const name of splitNames(rest)) {
        scan.locals.add(name);
      }
      return;
    case "import": {
      const as = rest.indexOf("as");
      if (as >= 0) {
        for (const name of splitNames(rest.slice(as + 1))) {
          scan.locals.add(name);
        }
      }
      return;
    }
    case "from": {
      const imported = rest.indexOf("import");
      for (const name of splitNames(rest.slice(imported + 1))) {
        if (name !== "as") {
          scan.locals.add(name);
        }
      }
      return;
    }
    case "if":
    case "elif":
    case "elseif":
    case "call":
      scan.expressions.push({ tokens: rest });
      return;
    default:
      scan.expressions.push({ tokens });
  }
}

function scanTemplate(source: string): TemplateScan {
  const scan: TemplateScan = { locals: new Set(), expressions: [] };
  const stripped = source.replace(COMMENT, "").replace(RAW_BLOCK, "");
  for (const match of stripped.matchAll(TAG)) {
    if (match[1] !== undefined) {
      scan.expressions.push({ tokens: tokenize(match[1]) });
    } else if (match[2] !== undefined) {
      scanTag(match[2], scan);
    }
  }
  return scan;
}

/**
 * Dotted references (`user`, `user.name`) that read from the render
 * context, in first-use order. Attribute access, filter and test names,
 * keyword arguments, dict keys and names bound by the template itself are
 * not references.
 */
export function jinjaReferences(source: string): string[] {
  const scan = scanTemplate(source);
  const references = new Set<string>();

  for (const { tokens } of scan.expressions) {
    tokens.forEach((token, index) => {
      if (!IDENTIFIER.test(token) || RESERVED.has(token) || scan.locals.has(token)) {
        return;
      }
      const previous = tokens[index - 1];
      const next = tokens[index + 1];
      if (previous === "." || previous === "|" || previous === "is") {
        return;
      }
      if (previous === "not" && tokens[index - 2] === "is") {
        return;
      }
      if ((next === "=" && tokens[index + 2] !== "=") || next === ":") {
        return;
      }

      let reference = token;
      let cursor = index + 1;
      while (tokens[cursor] === "." && IDENTIFIER.test(tokens[cursor + 1] ?? "")) {
        reference += `.${tokens[cursor + 1]}`;
        cursor += 2;
      }
      references.add(reference);
    });
  }
  return Array.from(references);
}

/** Top-level names a jinja template reads, in first-use order. */
export function jinjaVariables(source: string): string[] {
  const names = new Set<string>();
  for (const reference of jinjaReferences(source)) {
    names.add(reference.split(".")[0] ?? reference);
  }
  return Array.from(names);
}

/** First reference that resolves to nothing in `context`. */
export function findUnresolvedReference(
  source: string,
  context: Record<string, unknown>
): string | undefined {
  return jinjaReferences(source).find((reference) => {
    let value: unknown = context;
    for (const part of reference.split(".")) {
      if (value === undefined || value === null) {
        return true;
      }
      if (typeof value !== "object") {
        return false;
      }
      value = Reflect.get(value, part);
    }
    return value === undefined || value === null;
  });
}
