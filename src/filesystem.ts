/**
 * Zero-based line/character position inside a text document.
 */
export interface Position {
  line: number;
  character: number;
}

export interface Range {
  start: Position;
  end: Position;
}

/**
 * A region of a file the host can read or the user has highlighted.
 * When `range` is omitted the whole file is meant.
 */
export interface RangeInFile {
  filepath: string;
  range?: Range;
}

/**
 * All filesystem mutations a step can ask the host to perform.
 *
 * - add_file / delete_file: create (or overwrite) and remove a single file.
 * - add_directory / delete_directory: create and recursively remove a folder.
 * - file_edit: replace the text covered by `range` with `replacement`.
 *   An empty range inserts, which is how appends are expressed.
 */
export type FileSystemEdit =
  | AddFile
  | DeleteFile
  | AddDirectory
  | DeleteDirectory
  | FileEdit;

export interface AddFile {
  kind: "add_file";
  filepath: string;
  content?: string;
}

export interface DeleteFile {
  kind: "delete_file";
  filepath: string;
}

export interface AddDirectory {
  kind: "add_directory";
  path: string;
}

export interface DeleteDirectory {
  kind: "delete_directory";
  path: string;
}

export interface FileEdit {
  kind: "file_edit";
  filepath: string;
  range: Range;
  replacement: string;
}

/**
 * Position just past the last character of `content`.
 */
export function endOfContent(content: string): Position {
  const lines = content.split("\n");
  const lastLine = lines[lines.length - 1] ?? "";
  return { line: lines.length - 1, character: lastLine.length };
}

export function entireFileRange(contents: string): Range {
  return { start: { line: 0, character: 0 }, end: endOfContent(contents) };
}

export function rangeInFileFromEntireFile(
  filepath: string,
  contents: string
): RangeInFile {
  return { filepath, range: entireFileRange(contents) };
}

export function fileEditFromAppend(
  filepath: string,
  previousContent: string,
  appendedContent: string
): FileEdit {
  const end = endOfContent(previousContent);
  return {
    kind: "file_edit",
    filepath,
    range: { start: end, end },
    replacement: appendedContent,
  };
}

function lineStartOffsets(content: string): number[] {
  const offsets = [0];
  for (let i = 0; i < content.length; i++) {
    if (content[i] === "\n") {
      offsets.push(i + 1);
    }
  }
  return offsets;
}

function offsetOf(content: string, starts: number[], pos: Position): number {
  if (pos.line < 0) return 0;
  if (pos.line >= starts.length) return content.length;

  const lineStart = starts[pos.line];
  const nextStart = pos.line + 1 < starts.length ? starts[pos.line + 1] - 1 : content.length;
  const character = Math.max(0, pos.character);
  return Math.min(lineStart + character, nextStart);
}

/**
 * Convert a line/character range to string offsets, clamped to the content.
 */
export function rangeToOffsets(
  content: string,
  range: Range
): { startOffset: number; endOffset: number } {
  const starts = lineStartOffsets(content);
  const startOffset = offsetOf(content, starts, range.start);
  const endOffset = Math.max(startOffset, offsetOf(content, starts, range.end));
  return { startOffset, endOffset };
}

/**
 * Pure helper that applies a range replacement to a string of content.
 */
export function applyRangeReplacement(
  content: string,
  range: Range,
  replacement: string
): string {
  const { startOffset, endOffset } = rangeToOffsets(content, range);
  return content.slice(0, startOffset) + replacement + content.slice(endOffset);
}

export function readRange(content: string, range: Range | undefined): string {
  if (!range) return content;
  const { startOffset, endOffset } = rangeToOffsets(content, range);
  return content.slice(startOffset, endOffset);
}

/**
 * The path an edit targets, whichever variant it is.
 */
export function editTarget(edit: FileSystemEdit): string {
  switch (edit.kind) {
    case "add_file":
    case "delete_file":
    case "file_edit":
      return edit.filepath;
    case "add_directory":
    case "delete_directory":
      return edit.path;
  }
}
