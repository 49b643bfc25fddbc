// src/core/span.ts
// Source locations for tokens, datums and diagnostics.

export interface Span {
  file?: string;
  /** 1-based */
  startLine: number;
  /** 1-based */
  startCol: number;
  endLine?: number;
  endCol?: number;
}

export function spanCover(a: Span, b: Span): Span {
  return {
    file: a.file,
    startLine: a.startLine,
    startCol: a.startCol,
    endLine: b.endLine ?? b.startLine,
    endCol: b.endCol ?? b.startCol,
  };
}

export function formatSpan(span: Span): string {
  const where = `${span.startLine}:${span.startCol}`;
  return span.file ? `${span.file}:${where}` : where;
}
