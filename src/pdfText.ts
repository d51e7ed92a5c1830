import { errorMessage } from './textNormalizer.js';

/**
 * Plain text of a PDF, line breaks kept. Empty when the document has no
 * text layer or cannot be parsed.
 */
export async function extractPdfText(data: Uint8Array, maxChars: number): Promise<string> {
  try {
    const { PDFParse } = await import('pdf-parse');
    const parser = new PDFParse({ data });
    try {
      const result = await parser.getText();
      return (result.text ?? '').slice(0, maxChars);
    } finally {
      await parser.destroy();
    }
  } catch (err) {
    console.warn(`   [PDF] Text extraction failed: ${errorMessage(err)}`);
    return '';
  }
}
