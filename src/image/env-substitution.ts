/**
 * Line-targeted rewrites of the application's `.env` file.
 *
 * Each substitution is rendered as a GNU sed `s` command that replaces the
 * whole `KEY=...` line. The same command text goes into the Dockerfile (where
 * the shell expands `${ARG}` references) and is interpreted here for previews
 * and tests, so both paths produce identical files.
 *
 * Values are inserted verbatim. sed interprets them rather than copying them:
 * `&` and `\0` insert the matched line, `\n`, `\t`, `\r` and the numeric
 * escapes produce control characters, and `\U`, `\L`, `\u`, `\l` and `\E`
 * change case, so the line comes out altered. A delimiter or newline inside the
 * value ends the command early and sed rejects it. Either way the outcome is
 * the same on every run.
 */

export interface EnvSubstitution {
  /** Variable name at the start of the line, e.g. `DB_HOST`. */
  key: string;
  /** Replacement value; may reference build arguments as `${NAME}`. */
  template: string;
  /** Delimiter of the sed `s` command. */
  delimiter: string;
}

export const DEFAULT_SUBSTITUTIONS: readonly EnvSubstitution[] = [
  { key: "APP_ENV", template: "${APP_ENV}", delimiter: "/" },
  { key: "APP_URL", template: "https://${DOMAIN_NAME}/", delimiter: "|" },
  { key: "DB_HOST", template: "${RDS_ENDPOINT}", delimiter: "/" },
  { key: "DB_DATABASE", template: "${RDS_DATABASE}", delimiter: "/" },
];

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const ARG_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export class SedExpressionError extends Error {
  constructor(
    public readonly script: string,
    public readonly reason: string,
  ) {
    super(`sed: -e expression #1: ${reason}`);
    this.name = "SedExpressionError";
  }
}

export class MissingBuildArgError extends Error {
  constructor(public readonly argName: string) {
    super(`Build argument ${argName} is referenced but not supplied`);
    this.name = "MissingBuildArgError";
  }
}

/** Render `s<d>^KEY=.*<d>KEY=<template><d>`. */
export function renderSedScript(sub: EnvSubstitution): string {
  if (!KEY_PATTERN.test(sub.key)) {
    throw new Error(`Invalid variable name: ${sub.key}`);
  }
  if (sub.delimiter.length !== 1 || sub.delimiter === "\\" || sub.delimiter === "\n") {
    throw new Error(`Invalid sed delimiter for ${sub.key}: ${JSON.stringify(sub.delimiter)}`);
  }
  const d = sub.delimiter;
  return `s${d}^${sub.key}=.*${d}${sub.key}=${sub.template}${d}`;
}

/** Names of the build arguments a template references, in order of first use. */
export function referencedArgs(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(ARG_REFERENCE)) {
    const name = match[1];
    if (name !== undefined && !names.includes(name)) names.push(name);
  }
  return names;
}

/** Expand `${NAME}` references the way the build shell does. */
export function resolveTemplate(template: string, args: Readonly<Record<string, string>>): string {
  return template.replace(ARG_REFERENCE, (_whole, name: string) => {
    const value = args[name];
    if (value === undefined) throw new MissingBuildArgError(name);
    return value;
  });
}

export type CaseMode = "asis" | "upper" | "lower";

export type ReplacementPart =
  | { kind: "text"; text: string }
  | { kind: "match" }
  /** `\U`, `\L` and `\E`: applies until the next case mode. */
  | { kind: "case"; mode: CaseMode }
  /** `\u` and `\l`: applies to the next character produced. */
  | { kind: "caseFirst"; mode: "upper" | "lower" };

export interface ParsedScript {
  key: string;
  replacement: ReplacementPart[];
}

/** Numeric escapes: radix and the digits sed reads at most. */
const NUMERIC_ESCAPES: Readonly<Record<string, { radix: number; digits: number }>> = {
  d: { radix: 10, digits: 3 },
  o: { radix: 8, digits: 3 },
  x: { radix: 16, digits: 2 },
};

const CHARACTER_ESCAPES: Readonly<Record<string, string>> = {
  a: "\x07",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
  v: "\v",
};

/**
 * Parse a substitution script. Only the `^KEY=.*` address this module renders
 * is understood on the left-hand side; the right-hand side follows GNU sed.
 */
export function parseSedScript(script: string): ParsedScript {
  if (script[0] !== "s" || script.length < 2) {
    throw new SedExpressionError(script, "unknown command");
  }
  const d = script[1];
  if (d === undefined || d === "\\" || d === "\n") {
    throw new SedExpressionError(script, "delimiter cannot be a backslash or newline");
  }

  const lhs = readSection(script, 2, d, true);
  const address = /^\^([A-Za-z_][A-Za-z0-9_]*)=\.\*$/.exec(lhs.text);
  if (!address?.[1]) {
    throw new SedExpressionError(script, `unsupported pattern ${lhs.text}`);
  }

  const rhs = readSection(script, lhs.end, d, false);

  // `g` is a no-op for a whole-line address; anything else is what a stray delimiter leaves behind.
  const flags = script.slice(rhs.end);
  if (flags !== "" && flags !== "g") {
    throw new SedExpressionError(script, "unknown option to `s'");
  }

  return { key: address[1], replacement: parseReplacement(script, rhs.text) };
}

/**
 * Read up to the next unescaped delimiter. An escaped delimiter loses its
 * backslash; every other escape pair is kept for the next stage.
 */
function readSection(script: string, start: number, d: string, isPattern: boolean): { text: string; end: number } {
  let text = "";
  let i = start;
  while (i < script.length) {
    const ch = script[i];
    if (ch === d) return { text, end: i + 1 };
    if (ch === "\n" && !isPattern) break;
    if (ch === "\\") {
      const next = script[i + 1];
      if (next === undefined) break;
      if (next === "\n" || (next === d && !(d === "&" && !isPattern))) {
        text += next;
      } else {
        text += ch + next;
      }
      i += 2;
      continue;
    }
    text += ch;
    i++;
  }
  throw new SedExpressionError(script, "unterminated `s' command");
}

function parseReplacement(script: string, rhs: string): ReplacementPart[] {
  const parts: ReplacementPart[] = [];
  let text = "";
  const flush = (): void => {
    if (text) parts.push({ kind: "text", text });
    text = "";
  };

  let i = 0;
  while (i < rhs.length) {
    const ch = rhs[i];
    if (ch === "&") {
      flush();
      parts.push({ kind: "match" });
      i++;
      continue;
    }
    if (ch !== "\\") {
      text += ch;
      i++;
      continue;
    }

    const next = rhs[i + 1] ?? "";
    i += 2;
    const numeric = NUMERIC_ESCAPES[next];
    const character = CHARACTER_ESCAPES[next];
    if (numeric) {
      let digits = "";
      while (digits.length < numeric.digits && i < rhs.length && isDigit(rhs[i], numeric.radix)) {
        digits += rhs[i];
        i++;
      }
      if (!digits) {
        text += next;
        continue;
      }
      const code = Number.parseInt(digits, numeric.radix) & 0xff;
      if (code > 0x7f) {
        throw new SedExpressionError(script, `byte escape \\${next}${digits} outside ASCII is not supported`);
      }
      text += String.fromCharCode(code);
    } else if (character !== undefined) {
      text += character;
    } else if (next === "c") {
      const target = rhs[i];
      if (target === "\\") {
        throw new SedExpressionError(script, "recursive escaping after \\c not allowed");
      }
      if (target === undefined) {
        throw new SedExpressionError(script, "stray \\c at the end of the replacement");
      }
      text += String.fromCharCode(asciiUpper(target).charCodeAt(0) ^ 0x40);
      i++;
    } else if (next === "0") {
      flush();
      parts.push({ kind: "match" });
    } else if (/[1-9]/.test(next)) {
      throw new SedExpressionError(script, `invalid reference \\${next} on \`s' command's RHS`);
    } else if (next === "U" || next === "L" || next === "E") {
      flush();
      parts.push({ kind: "case", mode: next === "U" ? "upper" : next === "L" ? "lower" : "asis" });
    } else if (next === "u" || next === "l") {
      flush();
      parts.push({ kind: "caseFirst", mode: next === "u" ? "upper" : "lower" });
    } else {
      text += next;
    }
  }
  flush();
  return parts;
}

function isDigit(ch: string | undefined, radix: number): boolean {
  return ch !== undefined && !Number.isNaN(Number.parseInt(ch, radix));
}

/** sed in the image runs in the C locale, where only ASCII letters change case. */
function asciiUpper(text: string): string {
  return text.replace(/[a-z]/g, (c) => c.toUpperCase());
}

function asciiLower(text: string): string {
  return text.replace(/[A-Z]/g, (c) => c.toLowerCase());
}

function convertCase(text: string, mode: CaseMode): string {
  if (mode === "upper") return asciiUpper(text);
  if (mode === "lower") return asciiLower(text);
  return text;
}

/** Render the replacement for one matched line. */
export function renderReplacement(parts: readonly ReplacementPart[], line: string): string {
  let out = "";
  let mode: CaseMode = "asis";
  let first: "upper" | "lower" | undefined;

  for (const part of parts) {
    if (part.kind === "case") {
      mode = part.mode;
      continue;
    }
    if (part.kind === "caseFirst") {
      first = part.mode;
      continue;
    }
    const text = part.kind === "match" ? line : part.text;
    if (!text) continue;
    if (first) {
      const head = first === "upper" ? asciiUpper(text.slice(0, 1)) : asciiLower(text.slice(0, 1));
      out += head + convertCase(text.slice(1), mode);
      first = undefined;
    } else {
      out += convertCase(text, mode);
    }
  }
  return out;
}

/** Apply one script to every line of `content`, as `sed -i -e <script>` would. */
export function applySedScript(content: string, script: string): { content: string; matched: number } {
  const parsed = parseSedScript(script);
  const prefix = `${parsed.key}=`;
  let matched = 0;

  const lines = content.split("\n").map((line) => {
    if (!line.startsWith(prefix)) return line;
    matched++;
    return renderReplacement(parsed.replacement, line);
  });

  return { content: lines.join("\n"), matched };
}

export interface SubstitutionResult {
  content: string;
  /** Keys whose line was not found; sed leaves the file unchanged for them. */
  unmatched: string[];
}

/** Apply substitutions in order with their build-argument references expanded. */
export function substituteEnv(
  content: string,
  subs: readonly EnvSubstitution[],
  args: Readonly<Record<string, string>>,
): SubstitutionResult {
  let current = content;
  const unmatched: string[] = [];

  for (const sub of subs) {
    const script = renderSedScript({ ...sub, template: resolveTemplate(sub.template, args) });
    const result = applySedScript(current, script);
    if (result.matched === 0) unmatched.push(sub.key);
    current = result.content;
  }

  return { content: current, unmatched };
}

/**
 * Keys whose build-argument values contain a character sed interprets in the
 * replacement: the delimiter, a backslash, `&` or a newline.
 */
export function findUnsafeValues(
  subs: readonly EnvSubstitution[],
  args: Readonly<Record<string, string>>,
): string[] {
  return subs
    .filter((sub) =>
      referencedArgs(sub.template).some((name) => {
        const value = args[name] ?? "";
        return value.includes(sub.delimiter) || /[\\&\n]/.test(value);
      }),
    )
    .map((sub) => sub.key);
}
