export {
  RecognizerRouter,
  UnsupportedMediaError,
  plainTextRecognizer,
  mimeTypeForFile,
  PDF_MIME_TYPE,
} from './text-recognizer.js';
export type { TextRecognizer } from './text-recognizer.js';

export { PdfTextLayerReader, readTextLayer, toTextItem } from './pdf-text-layer.js';
export type { PdfTextLayer } from './pdf-text-layer.js';

export { buildReceiptLines, layoutPages } from './layout.js';
export type { TextItem } from './layout.js';
