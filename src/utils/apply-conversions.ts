/**
 * Conversion Pipeline
 * Applies ordered regex match/replace and validation rules to one value
 */

import { PatternError, ValidationError } from "./errors";
import type { Logger } from "./logger";
import type { ConversionRule } from "../types";

export type ConversionResult =
  | { ok: true; value: string }
  | { ok: false; error: ValidationError };

/**
 * Build RegExp flags from a rule's flag string (i, m, s)
 */
export function toRegExpFlags(flags: string): string {
  const lower = flags.toLowerCase();
  let result = "";
  if (lower.includes("i")) result += "i";
  if (lower.includes("m")) result += "m";
  if (lower.includes("s")) result += "s";
  return result;
}

/**
 * Accept the `(?P<name>...)` and `(?P=name)` group syntax that mapping
 * files written for other regex engines tend to contain
 */
export function normalizePattern(pattern: string): string {
  return pattern.replace(/\(\?P</g, "(?<").replace(/\(\?P=(\w+)\)/g, "\\k<$1>");
}

function compile(pattern: string, flags: string): RegExp {
  try {
    return new RegExp(normalizePattern(pattern), flags);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PatternError(pattern, message);
  }
}

function groupValue(match: RegExpMatchArray, ref: string, pattern: string): string {
  if (/^\d+$/.test(ref)) {
    const index = Number(ref);
    if (index >= match.length) {
      throw new PatternError(pattern, `invalid group reference ${index}`);
    }
    return match[index] ?? "";
  }
  const groups = match.groups;
  if (!groups || !(ref in groups)) {
    throw new PatternError(pattern, `unknown group name '${ref}'`);
  }
  return groups[ref] ?? "";
}

/**
 * Expand a replacement template for one match
 *
 * Back-references are written `\1`–`\99` or `\g<1>` / `\g<name>`; the whole
 * match is `\g<0>`. `\0` starts an octal escape (`\0` alone is NUL), not a
 * reference. `\n`, `\t` and `\\` are escapes. `$` has no special meaning.
 */
export function expandReplacement(
  template: string,
  match: RegExpMatchArray,
  pattern: string,
): string {
  let result = "";
  let i = 0;

  while (i < template.length) {
    const char = template[i];
    if (char !== "\\" || i === template.length - 1) {
      result += char;
      i++;
      continue;
    }

    const next = template[i + 1];
    const named = /^g<(\w+)>/.exec(template.slice(i + 1));
    const octal = /^0[0-7]{0,2}/.exec(template.slice(i + 1));
    const numbered = /^[1-9]\d?/.exec(template.slice(i + 1));

    if (named) {
      result += groupValue(match, named[1], pattern);
      i += 1 + named[0].length;
    } else if (octal) {
      result += String.fromCharCode(parseInt(octal[0], 8));
      i += 1 + octal[0].length;
    } else if (numbered) {
      result += groupValue(match, numbered[0], pattern);
      i += 1 + numbered[0].length;
    } else if (next === "n") {
      result += "\n";
      i += 2;
    } else if (next === "t") {
      result += "\t";
      i += 2;
    } else if (next === "\\") {
      result += "\\";
      i += 2;
    } else {
      result += char + next;
      i += 2;
    }
  }

  return result;
}

/**
 * Replace every match of `regex` (which must be global) in `input`
 */
export function substitute(regex: RegExp, template: string, input: string, pattern: string): string {
  let result = "";
  let last = 0;

  for (const match of input.matchAll(regex)) {
    const index = match.index ?? 0;
    result += input.slice(last, index) + expandReplacement(template, match, pattern);
    last = index + match[0].length;
  }

  return result + input.slice(last);
}

/**
 * True when `pattern` matches the whole of `value`
 *
 * Anchored with a sticky flag and a trailing lookahead so that a pattern's
 * own `^`/`$` keep their multiline meaning.
 */
export function fullMatch(pattern: string, flags: string, value: string): boolean {
  // Reject broken patterns before the wrapper can balance them
  compile(pattern, flags);
  const regex = compile(`(?:${pattern})(?![\\s\\S])`, flags + "y");
  regex.lastIndex = 0;
  return regex.test(value);
}

/**
 * Apply conversion rules to a trimmed value
 *
 * Rules run in order. The first substitution that changes the value wins
 * and later rules are not tried. A validation-only rule fails the value
 * when it does not fully match. Rules with a broken pattern are logged and
 * skipped.
 *
 * @example
 * applyConversions("15/03/2024", [
 *   { pattern: "(\\d{2})/(\\d{2})/(\\d{4})", replacement: "\\3-\\2-\\1", flags: "i" },
 * ], "DATUMINVUL", logger)
 * // { ok: true, value: "2024-03-15" }
 */
export function applyConversions(
  value: string,
  rules: ConversionRule[],
  field: string,
  logger: Logger,
): ConversionResult {
  for (const rule of rules) {
    const flags = toRegExpFlags(rule.flags);

    try {
      if (rule.replacement !== undefined) {
        const regex = compile(rule.pattern, flags + "g");
        const result = substitute(regex, rule.replacement, value, rule.pattern);
        if (result !== value) {
          logger.debug(`Converted ${field}: '${value}' → '${result}' (matched: ${rule.pattern})`);
          return { ok: true, value: result };
        }
      } else if (!fullMatch(rule.pattern, flags, value)) {
        const error = new ValidationError(field, value, rule.pattern);
        logger.error(`VALIDATION FAILED: ${field}='${value}' does not match pattern '${rule.pattern}'`);
        return { ok: false, error };
      }
    } catch (error) {
      if (!(error instanceof PatternError)) throw error;
      logger.warn(`Invalid regex in ${field} conversion: '${rule.pattern}' - ${error.message}`);
    }
  }

  return { ok: true, value };
}
