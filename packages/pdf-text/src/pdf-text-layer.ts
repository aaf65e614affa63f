import { getLogger } from '@fiscal-intake/types';
import { layoutPages, type TextItem } from './layout.js';
import { PDF_MIME_TYPE, UnsupportedMediaError, type TextRecognizer } from './text-recognizer.js';

// Loaded lazily; the legacy build runs under Node without a DOM.
const PDFJS_MODULE = 'pdfjs-dist/legacy/build/pdf.mjs';

interface PdfjsTextItemLike {
  str: string;
  transform: number[];
  width?: number;
  height?: number;
}

interface PdfPageLike {
  getTextContent(): Promise<{ items: unknown[] }>;
}

interface PdfDocumentLike {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfPageLike>;
  destroy(): Promise<void>;
}

interface PdfjsLike {
  getDocument(source: { data: Uint8Array; useSystemFonts?: boolean }): { promise: Promise<PdfDocumentLike> };
}

export interface PdfTextLayer {
  items: TextItem[];
  totalPages: number;
}

function isTextItem(item: unknown): item is PdfjsTextItemLike {
  return (
    typeof item === 'object' &&
    item !== null &&
    'str' in item &&
    typeof item.str === 'string' &&
    'transform' in item &&
    Array.isArray(item.transform)
  );
}

export function toTextItem(item: PdfjsTextItemLike, page: number): TextItem | null {
  const str = item.str.trim();
  if (str.length === 0) return null;

  const [scaleX = 1, , , scaleY = 12, x = 0, y = 0] = item.transform;
  return {
    str,
    x,
    y,
    width: item.width ?? Math.abs(scaleX) * str.length * 0.6,
    height: item.height ?? Math.abs(scaleY),
    page,
  };
}

async function loadPdfjs(): Promise<PdfjsLike> {
  const pdfjs: PdfjsLike = await import(PDFJS_MODULE);
  return pdfjs;
}

export async function readTextLayer(data: Uint8Array): Promise<PdfTextLayer> {
  const pdfjs = await loadPdfjs();
  // pdfjs takes ownership of the buffer it is given.
  const document = await pdfjs.getDocument({ data: new Uint8Array(data), useSystemFonts: true }).promise;

  try {
    const items: TextItem[] = [];
    for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
      const page = await document.getPage(pageNumber);
      const content = await page.getTextContent();
      for (const raw of content.items) {
        if (!isTextItem(raw)) continue;
        const item = toTextItem(raw, pageNumber);
        if (item !== null) items.push(item);
      }
    }
    return { items, totalPages: document.numPages };
  } finally {
    await document.destroy();
  }
}

/**
 * Reads the embedded text layer of digital PDFs. Scanned PDFs have none and
 * come back empty, which callers treat as "no text".
 */
export class PdfTextLayerReader implements TextRecognizer {
  async recognize(data: Uint8Array, mimeType: string = PDF_MIME_TYPE): Promise<string> {
    if (mimeType !== PDF_MIME_TYPE) {
      throw new UnsupportedMediaError(mimeType);
    }

    const layer = await readTextLayer(data);
    getLogger().debug(`PDF text layer: ${layer.items.length} items over ${layer.totalPages} pages`);
    return layoutPages(layer.items, layer.totalPages);
  }
}
