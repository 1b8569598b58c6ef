import { TransformInvariantViolation } from "../errors";

export const COMMENT_PREFIX = "--";

// Every terminator a SQL lexer or editor may treat as ending a `--` comment.
const LINE_BREAK = /\r\n|[\n\v\f\r\x1c-\x1e\x85\u2028\u2029]/;

export function splitLines(text: string): string[] {
  return text.split(LINE_BREAK);
}

function commentLine(line: string): string {
  return line === "" ? COMMENT_PREFIX : `${COMMENT_PREFIX} ${line}`;
}

export function isFullyCommented(text: string): boolean {
  return splitLines(text).every((line) => line.startsWith(COMMENT_PREFIX));
}

/**
 * Disable a generated model before it is persisted.
 *
 * Output is the checklist as comment lines, one bare `--` separator, then every SQL
 * line comment-prefixed. Blank lines become a bare `--`. Lines that already look like
 * comments are prefixed again.
 */
export function applySafetyTransform(modelSqlBody: string, checklistResponse: string): string {
  const checklist = splitLines(checklistResponse);
  const body = splitLines(modelSqlBody);

  const output = [...checklist.map(commentLine), COMMENT_PREFIX, ...body.map(commentLine)];

  const expected = checklist.length + 1 + body.length;
  if (output.length !== expected) {
    throw new TransformInvariantViolation(
      `Safety transform produced ${output.length} lines, expected ${expected}`
    );
  }

  const text = output.join("\n");
  const rendered = splitLines(text);
  if (rendered.length !== expected || !rendered.every((l) => l.startsWith(COMMENT_PREFIX))) {
    throw new TransformInvariantViolation("Safety transform left a line uncommented");
  }

  return text;
}
