import { Injectable } from '@nestjs/common';
import { PDFDocument, PDFFont, PDFPage, StandardFonts, rgb } from 'pdf-lib';
import { PdfRenderer, RenderRequest } from './pdf-renderer';
import { htmlToText } from './html-to-text';

const PAGE_WIDTH = 612; // US Letter, points
const PAGE_HEIGHT = 792;
const MARGIN = 50;
const LINE_HEIGHT = 14;
const FONT_SIZE = 11;
/** h1, h2, h3 */
const HEADING_SIZES = [16, 14, 12];

/**
 * pdf-lib implementation of PdfRenderer. Renders the text of the HTML with
 * the standard Helvetica fonts; no binaries or external services.
 */
@Injectable()
export class PdfLibRenderer extends PdfRenderer {
  async render(request: RenderRequest): Promise<Uint8Array> {
    const pdfDoc = await PDFDocument.create();
    const regular = await pdfDoc.embedFont(StandardFonts.Helvetica);
    const bold = await pdfDoc.embedFont(StandardFonts.HelveticaBold);

    let page = pdfDoc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
    let y = PAGE_HEIGHT - MARGIN;

    const ensureSpace = (needed: number): void => {
      if (y - needed < MARGIN) {
        page = pdfDoc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
        y = PAGE_HEIGHT - MARGIN;
      }
    };

    for (const rawLine of htmlToText(request.content).split('\n')) {
      const line = toWinAnsi(rawLine);
      const heading = /^(#{1,3}) (.*)$/.exec(line);

      if (heading) {
        const size = HEADING_SIZES[heading[1].length - 1];
        ensureSpace(size + 16);
        y -= 8;
        for (const wrapped of wrapText(heading[2], bold, size, PAGE_WIDTH - MARGIN * 2)) {
          drawText(page, wrapped, MARGIN, y, bold, size);
          y -= size + 4;
        }
        y -= 4;
      } else if (line === '---') {
        ensureSpace(20);
        y -= 10;
        page.drawLine({
          start: { x: MARGIN, y },
          end: { x: PAGE_WIDTH - MARGIN, y },
          thickness: 0.5,
          color: rgb(0.5, 0.5, 0.5),
        });
        y -= 10;
      } else if (line.length > 0) {
        const isItem = line.startsWith('- ');
        const indent = isItem ? 15 : 0;
        const text = isItem ? line.slice(2) : line;
        const wrappedLines = wrapText(text, regular, FONT_SIZE, PAGE_WIDTH - MARGIN * 2 - indent);

        wrappedLines.forEach((wrapped, index) => {
          ensureSpace(LINE_HEIGHT);
          if (isItem && index === 0) {
            drawText(page, '-', MARGIN + 4, y, regular, FONT_SIZE);
          }
          drawText(page, wrapped, MARGIN + indent, y, regular, FONT_SIZE);
          y -= LINE_HEIGHT;
        });
      } else {
        y -= LINE_HEIGHT / 2;
      }
    }

    pdfDoc.setTitle(toWinAnsi(request.title));
    pdfDoc.setCreationDate(new Date());

    return pdfDoc.save();
  }
}

/**
 * Standard fonts only encode WinAnsi; typographic quotes and dashes are
 * mapped, anything else outside Latin-1 becomes one '?' per code point.
 */
export function toWinAnsi(text: string): string {
  return text
    .replace(/[‘’]/g, "'")
    .replace(/[“”]/g, '"')
    .replace(/[–—]/g, '-')
    .replace(/…/g, '...')
    .replace(/[^\x20-\x7E\xA0-\xFF]/gu, '?');
}

export function wrapText(text: string, font: PDFFont, fontSize: number, maxWidth: number): string[] {
  const words = text.split(' ');
  const lines: string[] = [];
  let currentLine = '';

  for (const word of words) {
    const candidate = currentLine ? `${currentLine} ${word}` : word;
    if (font.widthOfTextAtSize(candidate, fontSize) > maxWidth && currentLine) {
      lines.push(currentLine);
      currentLine = word;
    } else {
      currentLine = candidate;
    }
  }

  if (currentLine) {
    lines.push(currentLine);
  }
  return lines;
}

function drawText(page: PDFPage, text: string, x: number, y: number, font: PDFFont, size: number): void {
  page.drawText(text, { x, y, size, font, color: rgb(0, 0, 0) });
}
