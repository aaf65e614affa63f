/** A positioned run of text from a PDF page. */
export interface TextItem {
  str: string;
  /** Left edge in PDF units. */
  x: number;
  /** Baseline, origin at the bottom of the page. */
  y: number;
  width: number;
  height: number;
  /** 1-indexed. */
  page: number;
}

/** Baselines closer than this share of the text height are one line. */
const SAME_LINE_RATIO = 0.5;
/** Gaps wider than this share of the text height read as a space. */
const WORD_GAP_RATIO = 0.15;

function sameLine(anchor: TextItem, item: TextItem): boolean {
  return Math.abs(anchor.y - item.y) <= Math.max(anchor.height, item.height) * SAME_LINE_RATIO;
}

function joinLine(items: TextItem[]): string {
  const ordered = [...items].sort((a, b) => a.x - b.x);
  return ordered
    .map((item, index) => {
      const previous = ordered[index - 1];
      if (previous === undefined) return item.str;
      const gap = item.x - (previous.x + previous.width);
      return gap > item.height * WORD_GAP_RATIO ? ` ${item.str}` : item.str;
    })
    .join('');
}

/**
 * Lines of one receipt page, top to bottom. Items whose baselines sit within
 * half a text height are read left to right as one line, so a label and the
 * amount printed beside it stay together.
 */
export function buildReceiptLines(items: TextItem[]): string[] {
  const lines: TextItem[][] = [];
  for (const item of [...items].sort((a, b) => b.y - a.y)) {
    const current = lines[lines.length - 1];
    const anchor = current?.[0];
    if (current !== undefined && anchor !== undefined && sameLine(anchor, item)) {
      current.push(item);
    } else {
      lines.push([item]);
    }
  }
  return lines.map(joinLine).filter((line) => line !== '');
}

/** Text of every page in order, pages separated by a blank line. */
export function layoutPages(items: TextItem[], totalPages: number): string {
  const pages: string[] = [];
  for (let page = 1; page <= totalPages; page++) {
    const lines = buildReceiptLines(items.filter((item) => item.page === page));
    if (lines.length > 0) pages.push(lines.join('\n'));
  }
  return pages.join('\n\n');
}
