import { ResumeExtractionError, errorMessage } from './errors.js';

export type ResumeFileExt = 'txt' | 'docx' | 'pdf' | 'doc';

export const MAX_RESUME_BYTES = 10 * 1024 * 1024; // 10 MB

function getExtension(fileName: string): ResumeFileExt | '' {
  const ext = fileName.toLowerCase().split('.').pop();
  if (ext === 'txt' || ext === 'docx' || ext === 'pdf' || ext === 'doc') return ext;
  return '';
}

export function normalizeResumeText(text: string): string {
  return text.replace(/\u0000/g, '').replace(/[ \t]+\n/g, '\n').replace(/\n{3,}/g, '\n\n').trim();
}

function extractFromTxt(bytes: Uint8Array): string {
  return new TextDecoder('utf-8').decode(bytes);
}

async function extractFromDocx(bytes: Uint8Array): Promise<string> {
  const { default: mammoth } = await import('mammoth');
  const result = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
  return result.value ?? '';
}

async function extractFromPdf(bytes: Uint8Array): Promise<string> {
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
  // pdfjs may detach the buffer it is given
  const loadingTask = pdfjs.getDocument({ data: new Uint8Array(bytes), isEvalSupported: false, useSystemFonts: true });
  const pdf = await loadingTask.promise;
  const pages: string[] = [];

  try {
    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const content = await page.getTextContent();
      const text = content.items
        .map((item) => ('str' in item ? item.str : ''))
        .join(' ');
      pages.push(text);
    }
  } finally {
    await pdf.destroy();
  }

  return pages.join('\n');
}

/**
 * Plain text from an uploaded résumé. Supports .txt, .docx and .pdf; legacy
 * .doc and everything else is rejected before any parsing.
 */
export async function extractResumeText(bytes: Uint8Array, fileName: string): Promise<string> {
  if (bytes.byteLength > MAX_RESUME_BYTES) {
    throw new ResumeExtractionError('too_large', 'File too large. Please upload a resume under 10 MB.');
  }

  const ext = getExtension(fileName);
  if (ext === 'doc') {
    throw new ResumeExtractionError(
      'unsupported_format',
      'Legacy .doc files are not supported. Please upload .docx, .pdf, or .txt.',
    );
  }
  if (ext === '') {
    throw new ResumeExtractionError('unsupported_format', 'Unsupported file type. Please upload .txt, .docx, or .pdf.');
  }

  let raw: string;
  try {
    if (ext === 'txt') raw = extractFromTxt(bytes);
    else if (ext === 'docx') raw = await extractFromDocx(bytes);
    else raw = await extractFromPdf(bytes);
  } catch (err) {
    throw new ResumeExtractionError('unreadable', `Could not read ${ext} file: ${errorMessage(err)}`, { cause: err });
  }

  const text = normalizeResumeText(raw);
  if (!text) {
    throw new ResumeExtractionError('empty', 'No text could be extracted from the uploaded file.');
  }
  return text;
}
