import { describe, it, expect } from 'vitest';
import {
  PDF_MIME_TYPE,
  PdfTextLayerReader,
  RecognizerRouter,
  UnsupportedMediaError,
  mimeTypeForFile,
  plainTextRecognizer,
} from '@fiscal-intake/pdf-text';

const encode = (text: string): Uint8Array => new TextEncoder().encode(text);

describe('mimeTypeForFile', () => {
  it('should map known extensions', () => {
    expect(mimeTypeForFile('recibo.PDF')).toBe(PDF_MIME_TYPE);
    expect(mimeTypeForFile('scan.jpeg')).toBe('image/jpeg');
    expect(mimeTypeForFile('notes.txt')).toBe('text/plain');
  });

  it('should fall back to octet-stream', () => {
    expect(mimeTypeForFile('archive.rar')).toBe('application/octet-stream');
    expect(mimeTypeForFile('README')).toBe('application/octet-stream');
  });
});

describe('RecognizerRouter', () => {
  it('should route by mime type', async () => {
    const router = new RecognizerRouter()
      .register('text/plain', plainTextRecognizer)
      .register('image/png', { recognize: () => Promise.resolve('from image') });

    expect(await router.recognize(encode('Recibo R$ 10,00'), 'text/plain')).toBe('Recibo R$ 10,00');
    expect(await router.recognize(new Uint8Array(), 'image/png')).toBe('from image');
  });

  it('should refuse unregistered types', async () => {
    await expect(new RecognizerRouter().recognize(new Uint8Array(), 'image/webp')).rejects.toThrow(
      'No text recognizer configured for image/webp'
    );
  });
});

describe('PdfTextLayerReader', () => {
  it('should only accept PDFs', async () => {
    await expect(new PdfTextLayerReader().recognize(encode('x'), 'image/png')).rejects.toBeInstanceOf(
      UnsupportedMediaError
    );
  });
});
