import fs from "node:fs/promises";
import type { FileSpec } from "@satchel/schemas";
import { ConfigurationError, TemplateError } from "./errors";

/**
 * Minimal action templates: literal text with `{{ fn "arg" ... }}` calls.
 *
 * Only the functions handed to the renderer exist. Arguments are string
 * literals, double-quoted with JSON escapes or back-quoted raw. `{{- ` and
 * ` -}}` trim the whitespace on that side of the action. An action holding
 * only a slash-star comment renders nothing.
 */
export type TemplateFunction = (...args: string[]) => unknown;
export type TemplateFunctions = Readonly<Record<string, TemplateFunction>>;
export type SecretLookup = (name: string, key: string) => unknown;

type TemplateNode =
  | { kind: "text"; value: string }
  | { kind: "call"; name: string; args: string[]; line: number };

type Token = { kind: "ident"; value: string } | { kind: "string"; value: string };

interface ScannedAction {
  tokens: Token[];
  comment: boolean;
  end: number;
  trimRight: boolean;
}

const OPEN = "{{";
const CLOSE = "}}";
const IDENT = /[A-Za-z_][A-Za-z0-9_]*/y;

export function parseTemplate(source: string, name: string, functions: TemplateFunctions): TemplateNode[] {
  const nodes: TemplateNode[] = [];
  let cursor = 0;
  let trimNext = false;

  while (cursor < source.length) {
    const start = source.indexOf(OPEN, cursor);
    if (start === -1) {
      pushText(nodes, source.slice(cursor), trimNext, false);
      break;
    }

    let bodyStart = start + OPEN.length;
    const trimLeft = source[bodyStart] === "-" && isSpace(source[bodyStart + 1]);
    if (trimLeft) bodyStart += 1;
    pushText(nodes, source.slice(cursor, start), trimNext, trimLeft);

    const line = lineAt(source, start);
    const action = scanAction(source, bodyStart, name, line);
    if (!action.comment) {
      nodes.push(buildCall(action.tokens, name, line, functions));
    }
    cursor = action.end;
    trimNext = action.trimRight;
  }

  return nodes;
}

export function executeTemplate(nodes: TemplateNode[], name: string, functions: TemplateFunctions): string {
  let out = "";
  for (const node of nodes) {
    if (node.kind === "text") {
      out += node.value;
      continue;
    }
    const fn = functions[node.name];
    let value: unknown;
    try {
      value = fn(...node.args);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TemplateError(`template ${name}:${node.line}: error calling ${node.name}: ${reason}`, name, { cause: err });
    }
    out += formatValue(value);
  }
  return out;
}

export function renderTemplate(source: string, name: string, functions: TemplateFunctions): string {
  return executeTemplate(parseTemplate(source, name, functions), name, functions);
}

/**
 * Checks that a file has exactly one template source. Runs before any I/O.
 */
export function validateTemplateSource(file: FileSpec): void {
  if (file.template && file.templateFile) {
    throw new ConfigurationError(`inline template and template file specified for ${file.path}`);
  }
  if (!file.template && !file.templateFile) {
    throw new ConfigurationError(`no content defined for file ${file.path}`);
  }
}

/**
 * Renders a file's template. File templates only get `secret(name, key)`; any
 * failure aborts the whole render.
 */
export async function renderFile(file: FileSpec, secret: SecretLookup): Promise<string> {
  validateTemplateSource(file);
  const { source, name } = await loadTemplate(file);
  return renderTemplate(source, name, {
    secret: (secretName: string, key: string) => secret(secretName, key)
  });
}

async function loadTemplate(file: FileSpec): Promise<{ source: string; name: string }> {
  if (file.template) {
    return { source: file.template, name: file.path };
  }
  if (file.templateFile) {
    try {
      return { source: await fs.readFile(file.templateFile, "utf-8"), name: file.templateFile };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigurationError(`couldn't read template file ${file.templateFile} for ${file.path}: ${reason}`, {
        cause: err
      });
    }
  }
  throw new ConfigurationError(`no content defined for file ${file.path}`);
}

function scanAction(source: string, from: number, name: string, line: number): ScannedAction {
  const fail = (message: string) => new TemplateError(`template ${name}:${line}: ${message}`, name);
  const tokens: Token[] = [];
  let i = skipSpace(source, from);
  let comment = false;

  if (source.startsWith("/*", i)) {
    const close = source.indexOf("*/", i + 2);
    if (close === -1) throw fail("unclosed comment");
    comment = true;
    i = close + 2;
  }

  while (i < source.length) {
    const before = i;
    i = skipSpace(source, i);

    if (source.startsWith(CLOSE, i)) {
      return { tokens, comment, end: i + CLOSE.length, trimRight: false };
    }
    if (source[i] === "-" && source.startsWith(CLOSE, i + 1) && (i > before || isSpace(source[i - 1]))) {
      return { tokens, comment, end: i + 1 + CLOSE.length, trimRight: true };
    }
    if (comment) throw fail("comment must be the only content of an action");
    if (tokens.length > 0 && i === before) throw fail(`expected space before ${JSON.stringify(source[i])}`);

    const ch = source[i];
    if (ch === '"') {
      const end = scanQuoted(source, i, fail);
      tokens.push({ kind: "string", value: unquote(source.slice(i, end), fail) });
      i = end;
    } else if (ch === "`") {
      const close = source.indexOf("`", i + 1);
      if (close === -1) throw fail("unterminated raw string");
      tokens.push({ kind: "string", value: source.slice(i + 1, close) });
      i = close + 1;
    } else {
      IDENT.lastIndex = i;
      const match = IDENT.exec(source);
      if (!match) throw fail(`unexpected ${JSON.stringify(ch)} in action`);
      tokens.push({ kind: "ident", value: match[0] });
      i += match[0].length;
    }
  }

  throw fail("unclosed action");
}

function scanQuoted(source: string, start: number, fail: (message: string) => TemplateError): number {
  let i = start + 1;
  while (i < source.length) {
    const ch = source[i];
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === "\n") break;
    if (ch === '"') return i + 1;
    i += 1;
  }
  throw fail("unterminated quoted string");
}

function unquote(literal: string, fail: (message: string) => TemplateError): string {
  try {
    const value: unknown = JSON.parse(literal);
    if (typeof value === "string") return value;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw fail(`invalid quoted string ${literal}: ${reason}`);
  }
  throw fail(`invalid quoted string ${literal}`);
}

function buildCall(tokens: Token[], name: string, line: number, functions: TemplateFunctions): TemplateNode {
  const fail = (message: string) => new TemplateError(`template ${name}:${line}: ${message}`, name);
  const [head, ...rest] = tokens;
  if (!head) throw fail("missing function name");
  if (head.kind !== "ident") throw fail(`expected function name, found ${JSON.stringify(head.value)}`);
  if (!Object.hasOwn(functions, head.value)) throw fail(`function "${head.value}" not defined`);

  const args: string[] = [];
  for (const token of rest) {
    if (token.kind !== "string") throw fail(`unexpected identifier ${token.value} in arguments to ${head.value}`);
    args.push(token.value);
  }

  const arity = functions[head.value].length;
  if (args.length !== arity) {
    throw fail(`wrong number of args for ${head.value}: want ${arity} got ${args.length}`);
  }
  return { kind: "call", name: head.value, args, line };
}

function pushText(nodes: TemplateNode[], text: string, trimStart: boolean, trimEnd: boolean): void {
  let value = text;
  if (trimStart) value = value.replace(/^\s+/, "");
  if (trimEnd) value = value.replace(/\s+$/, "");
  if (value.length > 0) nodes.push({ kind: "text", value });
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") return String(value);
  return JSON.stringify(value);
}

function skipSpace(source: string, from: number): number {
  let i = from;
  while (i < source.length && isSpace(source[i])) i += 1;
  return i;
}

function isSpace(ch: string | undefined): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || ch === "\r";
}

function lineAt(source: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset; i += 1) {
    if (source[i] === "\n") line += 1;
  }
  return line;
}
