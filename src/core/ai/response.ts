import { normalizeLineEndings } from "../text.js";

const WRAPPING_FENCE = /^```[\w-]*\n([\s\S]*?)\n```$/;
const PREAMBLE_LINE = /^(?:sure|certainly|of course|absolutely|okay|ok|here(?:'s|’s| is)|below is)\b[^\n]*:$/i;
// Sign-offs count only when they address the requester, not the journal's own reflections.
const CLOSING_LINE =
  /^(?:i hope (?:this|that)(?: (?:draft|report|journal(?: entry| report)?|entry|version))? (?:helps|is (?:helpful|useful|what you need)|meets your needs|works for you)|(?:please )?let me know\b|feel free to (?:ask|edit|adjust|modify|let me know|reach out)|if you(?:'d| would) like (?:me to|any|to (?:adjust|change|edit|revise))|would you like me to)/i;

function dropLeadingBlankLines(lines: string[]): void {
  while (lines.length > 0 && !lines[0]?.trim()) {
    lines.shift();
  }
}

function dropTrailingBlankLines(lines: string[]): void {
  while (lines.length > 0 && !lines[lines.length - 1]?.trim()) {
    lines.pop();
  }
}

function unwrapFence(text: string): string {
  const match = WRAPPING_FENCE.exec(text);
  return match?.[1] !== undefined ? match[1].trim() : text;
}

/**
 * Removes chatter the model wraps around the journal entry: a restated
 * prompt, a fenced block around the whole answer, a "Here is..." lead-in line
 * and "Let me know..." sign-off lines. The body is otherwise left untouched.
 */
export function stripBoilerplate(raw: string, prompt: string): string {
  let text = unwrapFence(normalizeLineEndings(raw).trim());

  const restatedPrompt = normalizeLineEndings(prompt).trim();
  if (restatedPrompt && text.startsWith(restatedPrompt)) {
    text = text.slice(restatedPrompt.length).trim();
  }

  const lines = text.split("\n");
  dropLeadingBlankLines(lines);
  while (lines.length > 0 && PREAMBLE_LINE.test(lines[0]?.trim() ?? "")) {
    lines.shift();
    dropLeadingBlankLines(lines);
  }

  dropTrailingBlankLines(lines);
  while (lines.length > 0 && CLOSING_LINE.test(lines[lines.length - 1]?.trim() ?? "")) {
    lines.pop();
    dropTrailingBlankLines(lines);
  }

  return lines.join("\n").trim();
}
