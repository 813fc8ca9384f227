/**
 * In-memory diff shape consumed by the line validator.
 */

export type DiffLineRecord =
  | { kind: "added"; newLine: number; text?: string }
  | { kind: "context"; newLine: number; text?: string }
  | { kind: "removed"; oldLine?: number; text?: string };

export type DiffHunk = {
  oldStart: number;
  newStart: number;
  /** Text after the closing "@@", usually the enclosing function. */
  header: string;
  lines: DiffLineRecord[];
};

export type FileDiff = {
  path: string;
  hunks: DiffHunk[];
};

export type CommentTarget<P = unknown> = {
  path: string;
  line: number;
  payload?: P;
};

export type DropReason = "FileNotInDiff" | "NoAddedLines" | "OutOfRange" | "InvalidLine";

export type CommentValidation<P = unknown> =
  | { status: "accepted"; target: CommentTarget<P>; line: number }
  | { status: "corrected"; target: CommentTarget<P>; line: number; distance: number }
  | { status: "dropped"; target: CommentTarget<P>; reason: DropReason };
