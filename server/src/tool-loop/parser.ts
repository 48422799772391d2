/**
 * Tool Call Parser
 *
 * Finds the first `Using tool: name(args)` directive in a model reply.
 * Hand-scanned rather than regex-matched so quoted values may contain
 * parentheses and commas. Never throws: a malformed directive comes back
 * as an outcome and the caller treats the reply as plain text.
 */

import { ParseError } from "../errors.js";
import type { ToolInvocationRequest } from "../tools/types.js";

export const DIRECTIVE_KEYWORD = "Using tool:";

export type ParseOutcome =
  | { kind: "none"; text: string }
  | {
      kind: "directive";
      request: ToolInvocationRequest;
      /** The directive exactly as it appeared in the reply */
      directiveText: string;
      /** The reply with the directive removed */
      passthrough: string;
    }
  | { kind: "malformed"; error: ParseError; text: string };

const NAME_START = /[a-zA-Z_]/;
const NAME_CHAR = /[a-zA-Z0-9_.]/;

function isInlineSpace(ch: string): boolean {
  return ch === " " || ch === "\t";
}

function isLineBreak(ch: string): boolean {
  return ch === "\n" || ch === "\r";
}

/**
 * Index of the parenthesis closing the one just before `start`, or a
 * ParseError. Tracks quote state (backslash escapes inside quotes) and
 * nested unquoted parentheses; a line break ends the directive.
 */
function findClosingParen(text: string, start: number): number | ParseError {
  let depth = 1;
  let quote: string | null = null;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (isLineBreak(ch)) {
      return new ParseError("Directive arguments run past the end of the line", i);
    }

    if (quote) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = null;
      continue;
    }

    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === "(") depth++;
    else if (ch === ")" && --depth === 0) return i;
  }

  return new ParseError(
    quote ? "Unterminated quoted value in directive" : "Unbalanced parentheses in directive",
    text.length,
  );
}

function joinAround(before: string, after: string): string {
  const head = before.trimEnd();
  const tail = after.trimStart();
  if (head && tail) return `${head}\n${tail}`;
  return head || tail;
}

export function parseToolCall(text: string): ParseOutcome {
  const keywordAt = text.indexOf(DIRECTIVE_KEYWORD);
  if (keywordAt === -1) return { kind: "none", text };

  const malformed = (error: ParseError): ParseOutcome => ({ kind: "malformed", error, text });

  let pos = keywordAt + DIRECTIVE_KEYWORD.length;
  while (pos < text.length && isInlineSpace(text[pos])) pos++;

  const nameStart = pos;
  if (pos >= text.length || !NAME_START.test(text[pos])) {
    return malformed(new ParseError(`Expected a tool name after "${DIRECTIVE_KEYWORD}"`, pos));
  }
  while (pos < text.length && NAME_CHAR.test(text[pos])) pos++;
  const toolName = text.slice(nameStart, pos);

  while (pos < text.length && isInlineSpace(text[pos])) pos++;
  if (text[pos] !== "(") {
    return malformed(new ParseError(`Expected "(" after tool name "${toolName}"`, pos));
  }

  const close = findClosingParen(text, pos + 1);
  if (close instanceof ParseError) return malformed(close);

  return {
    kind: "directive",
    request: { toolName, rawParameters: text.slice(pos + 1, close) },
    directiveText: text.slice(keywordAt, close + 1),
    passthrough: joinAround(text.slice(0, keywordAt), text.slice(close + 1)),
  };
}
