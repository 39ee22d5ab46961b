/**
 * pdfkit-backed Renderer for the generation stage.
 *
 * A template that does not parse is a permanent failure. Anything pdfkit
 * throws while drawing is treated as transient.
 */

import PDFDocument from 'pdfkit';
import { RenderError, createLogger, type Logger } from '@docpipe/shared';
import type { RenderRequest, Renderer } from '@docpipe/pipeline';
import { layoutTemplate, parseTemplate, type LayoutLine, type Template } from './template';

const MARGIN = 50;
const ROW_HEIGHT = 20;

function drawTable(doc: PDFKit.PDFDocument, columns: string[], rows: string[][]): void {
  const left = doc.page.margins.left;
  const width = doc.page.width - doc.page.margins.left - doc.page.margins.right;
  const colWidth = width / columns.length;
  const bottom = () => doc.page.height - doc.page.margins.bottom - ROW_HEIGHT;

  const drawRow = (cells: string[], y: number, bold: boolean) => {
    doc.font(bold ? 'Helvetica-Bold' : 'Helvetica').fontSize(9).fillColor('#000000');
    cells.forEach((cell, i) => {
      doc.text(cell, left + i * colWidth + 4, y + 6, { width: colWidth - 8, height: ROW_HEIGHT - 6, ellipsis: true });
    });
  };

  let y = doc.y;
  doc.rect(left, y, width, ROW_HEIGHT).fill('#e0e0e0');
  drawRow(columns, y, true);
  y += ROW_HEIGHT;

  if (rows.length === 0) {
    drawRow(['No rows'], y, false);
    y += ROW_HEIGHT;
  }
  rows.forEach((row, index) => {
    if (y > bottom()) {
      doc.addPage();
      y = doc.page.margins.top;
    }
    if (index % 2 === 0) doc.rect(left, y, width, ROW_HEIGHT).fill('#f9f9f9');
    drawRow(row, y, false);
    y += ROW_HEIGHT;
  });

  doc.x = left;
  doc.y = y + 8;
}

function drawLine(doc: PDFKit.PDFDocument, line: LayoutLine): void {
  switch (line.kind) {
    case 'title':
      doc.font('Helvetica-Bold').fontSize(20).fillColor('#000000').text(line.text, { align: 'center' });
      doc.moveDown(0.5);
      return;
    case 'subtitle':
      doc.font('Helvetica').fontSize(11).fillColor('#444444').text(line.text, { align: 'center' });
      doc.moveDown(1);
      return;
    case 'heading':
      doc.moveDown(0.8);
      doc.font('Helvetica-Bold').fontSize(13).fillColor('#000000').text(line.text);
      doc.moveDown(0.3);
      return;
    case 'field':
      doc
        .fontSize(10)
        .fillColor('#000000')
        .font('Helvetica-Bold')
        .text(`${line.label}: `, { continued: true })
        .font('Helvetica')
        .text(line.value);
      return;
    case 'table':
      drawTable(doc, line.columns, line.rows);
      return;
    case 'footer':
      doc.moveDown(2);
      doc.font('Helvetica').fontSize(8).fillColor('#666666').text(line.text, { align: 'center' });
      return;
  }
}

/** Draw layout lines into a PDF and collect the bytes. */
export function drawPdf(template: Template, lines: LayoutLine[], signal?: AbortSignal): Promise<Uint8Array> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ size: template.pageSize, margin: MARGIN, info: { Title: template.title } });
    const chunks: Buffer[] = [];
    const onAbort = () => reject(signal?.reason instanceof Error ? signal.reason : new Error('Render aborted'));

    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('error', reject);
    doc.on('end', () => {
      signal?.removeEventListener('abort', onAbort);
      resolve(new Uint8Array(Buffer.concat(chunks)));
    });
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      for (const line of lines) drawLine(doc, line);
      doc.end();
    } catch (err) {
      signal?.removeEventListener('abort', onAbort);
      reject(err);
    }
  });
}

export class PdfRenderer implements Renderer {
  private readonly log: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.log = options.logger ?? createLogger('pdf-renderer');
  }

  async render(request: RenderRequest): Promise<Uint8Array> {
    const parsed = parseTemplate(request.template);
    if (!parsed.success) {
      throw new RenderError({ message: `Invalid template: ${parsed.issues.join('; ')}`, kind: 'permanent' });
    }

    const lines = layoutTemplate(parsed.template, request.record);
    const t0 = Date.now();
    try {
      const bytes = await drawPdf(parsed.template, lines, request.signal);
      this.log.info('render_complete', { jobId: request.jobId, bytes: bytes.byteLength, lines: lines.length, durationMs: Date.now() - t0 });
      return bytes;
    } catch (err) {
      throw new RenderError({ message: err instanceof Error ? err.message : 'PDF drawing failed', kind: 'transient', cause: err });
    }
  }
}
