/**
 * Turns an uploaded document into plain text. Image OCR engines plug in
 * here; the PDF text-layer reader is the built-in implementation.
 */
export interface TextRecognizer {
  recognize(data: Uint8Array, mimeType: string): Promise<string>;
}

export class UnsupportedMediaError extends Error {
  constructor(readonly mimeType: string) {
    super(`No text recognizer configured for ${mimeType}`);
    this.name = 'UnsupportedMediaError';
  }
}

export const PDF_MIME_TYPE = 'application/pdf';

const EXTENSION_MIME_TYPES: Record<string, string> = {
  pdf: PDF_MIME_TYPE,
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
  txt: 'text/plain',
};

export function mimeTypeForFile(fileName: string): string {
  const extension = fileName.toLowerCase().split('.').pop() ?? '';
  return EXTENSION_MIME_TYPES[extension] ?? 'application/octet-stream';
}

/** Routes each document to the recognizer registered for its mime type. */
export class RecognizerRouter implements TextRecognizer {
  private readonly routes = new Map<string, TextRecognizer>();

  register(mimeType: string, recognizer: TextRecognizer): this {
    this.routes.set(mimeType, recognizer);
    return this;
  }

  async recognize(data: Uint8Array, mimeType: string): Promise<string> {
    const recognizer = this.routes.get(mimeType);
    if (recognizer === undefined) {
      throw new UnsupportedMediaError(mimeType);
    }
    return recognizer.recognize(data, mimeType);
  }
}

/** Plain-text uploads pass through unchanged. */
export const plainTextRecognizer: TextRecognizer = {
  recognize: (data) => Promise.resolve(new TextDecoder('utf-8').decode(data)),
};
