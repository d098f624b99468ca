import { jsPDF } from 'jspdf';
import type { ReportModel, Rgb } from './layout';
import { TIER_COLORS } from './layout';

const MARGIN = 40;
const TEXT_FONT_SIZE = 9;
const LINE_HEIGHT = 12;
const SUSPECT_COLOR: Rgb = [200, 30, 30];
const BODY_COLOR: Rgb = [30, 30, 30];
const MUTED_COLOR: Rgb = [110, 110, 110];
const LINK_COLOR: Rgb = [20, 80, 180];
const UNIQUE_SLICE_COLOR: Rgb = [46, 160, 67];
const MATCHED_SLICE_COLOR: Rgb = [210, 45, 45];

const setText = (doc: jsPDF, color: Rgb) => doc.setTextColor(color[0], color[1], color[2]);
const setFill = (doc: jsPDF, color: Rgb) => doc.setFillColor(color[0], color[1], color[2]);

/** Pie slice between two angles in degrees, clockwise from 12 o'clock. */
const drawSlice = (doc: jsPDF, cx: number, cy: number, radius: number, from: number, to: number, color: Rgb) => {
  const sweep = to - from;
  if (sweep <= 0) return;
  setFill(doc, color);
  if (sweep >= 360) {
    doc.circle(cx, cy, radius, 'F');
    return;
  }
  const steps = Math.max(2, Math.ceil(sweep / 6));
  const segments: number[][] = [];
  let prevX = cx;
  let prevY = cy;
  for (let i = 0; i <= steps; i += 1) {
    const angle = ((from + (sweep * i) / steps - 90) * Math.PI) / 180;
    const x = cx + radius * Math.cos(angle);
    const y = cy + radius * Math.sin(angle);
    segments.push([x - prevX, y - prevY]);
    prevX = x;
    prevY = y;
  }
  doc.lines(segments, cx, cy, [1, 1], 'F', true);
};

export const renderReportPdf = (model: ReportModel): Uint8Array => {
  const doc = new jsPDF({ unit: 'pt', format: 'a4' });
  doc.setProperties({ title: `${model.title} - ${model.documentName}` });

  const pageWidth = doc.internal.pageSize.getWidth();
  const pageHeight = doc.internal.pageSize.getHeight();
  const contentWidth = pageWidth - MARGIN * 2;
  let y = MARGIN;

  const ensureSpace = (height: number) => {
    if (y + height > pageHeight - MARGIN) {
      doc.addPage();
      y = MARGIN;
    }
  };

  // Header
  doc.setFont('helvetica', 'bold');
  doc.setFontSize(18);
  setText(doc, BODY_COLOR);
  doc.text(model.title, MARGIN, y + 14);
  y += 30;
  doc.setFont('helvetica', 'normal');
  doc.setFontSize(10);
  setText(doc, MUTED_COLOR);
  doc.text(`Document: ${model.documentName}`, MARGIN, y);
  y += 14;
  doc.text(`Generated: ${model.generatedAt}`, MARGIN, y);
  y += 18;

  // Score banner
  setFill(doc, TIER_COLORS[model.tier]);
  doc.rect(MARGIN, y, contentWidth, 40, 'F');
  doc.setFont('helvetica', 'bold');
  doc.setFontSize(16);
  doc.setTextColor(255, 255, 255);
  doc.text(model.bannerLabel, pageWidth / 2, y + 26, { align: 'center' });
  y += 56;

  // Proportion chart
  const radius = 55;
  const cx = MARGIN + radius + 10;
  const cy = y + radius;
  const matchedDegrees = (model.chart.matched / 100) * 360;
  drawSlice(doc, cx, cy, radius, 0, matchedDegrees, MATCHED_SLICE_COLOR);
  drawSlice(doc, cx, cy, radius, matchedDegrees, 360, UNIQUE_SLICE_COLOR);
  doc.setFont('helvetica', 'normal');
  doc.setFontSize(11);
  const legendX = cx + radius + 30;
  setFill(doc, UNIQUE_SLICE_COLOR);
  doc.rect(legendX, cy - 22, 10, 10, 'F');
  setText(doc, BODY_COLOR);
  doc.text(`Unique content: ${model.chart.unique.toFixed(2)}%`, legendX + 16, cy - 13);
  setFill(doc, MATCHED_SLICE_COLOR);
  doc.rect(legendX, cy + 4, 10, 10, 'F');
  doc.text(`Matched content: ${model.chart.matched.toFixed(2)}%`, legendX + 16, cy + 13);
  y += radius * 2 + 24;

  // Annotated text
  doc.setFont('helvetica', 'bold');
  doc.setFontSize(13);
  ensureSpace(20);
  doc.text('Analyzed text', MARGIN, y);
  y += 18;
  doc.setFont('helvetica', 'normal');
  doc.setFontSize(TEXT_FONT_SIZE);
  for (const line of model.lines) {
    setText(doc, line.suspect ? SUSPECT_COLOR : BODY_COLOR);
    const wrapped: string[] = doc.splitTextToSize(line.text, contentWidth);
    for (const part of wrapped) {
      ensureSpace(LINE_HEIGHT);
      doc.text(part, MARGIN, y);
      y += LINE_HEIGHT;
    }
  }

  // Footer
  y += 8;
  ensureSpace(LINE_HEIGHT * 2);
  doc.setFont('helvetica', 'italic');
  doc.setFontSize(8);
  setText(doc, MUTED_COLOR);
  doc.text(model.footer, MARGIN, y);
  y += LINE_HEIGHT * 2;

  // Sources
  ensureSpace(40);
  doc.setFont('helvetica', 'bold');
  doc.setFontSize(13);
  setText(doc, BODY_COLOR);
  doc.text('Top matching sources', MARGIN, y);
  y += 18;
  doc.setFontSize(10);
  if (model.sources.length === 0) {
    doc.setFont('helvetica', 'normal');
    doc.text('No matching sources above the relevance threshold.', MARGIN, y);
  }
  for (const source of model.sources) {
    ensureSpace(LINE_HEIGHT * 2 + 4);
    doc.setFont('helvetica', 'normal');
    setText(doc, BODY_COLOR);
    const prefix = `${source.rank}. [${source.score.toFixed(2)}%] `;
    doc.text(prefix, MARGIN, y);
    const prefixWidth = doc.getTextWidth(prefix);
    const titleLines: string[] = doc.splitTextToSize(source.title, contentWidth - prefixWidth);
    setText(doc, LINK_COLOR);
    doc.textWithLink(titleLines[0] ?? source.displayUrl, MARGIN + prefixWidth, y, { url: source.url });
    y += LINE_HEIGHT;
    doc.setFontSize(8);
    setText(doc, MUTED_COLOR);
    const urlLines: string[] = doc.splitTextToSize(source.displayUrl, contentWidth - prefixWidth);
    doc.text(urlLines[0] ?? '', MARGIN + prefixWidth, y);
    doc.setFontSize(10);
    y += LINE_HEIGHT + 4;
  }

  return new Uint8Array(doc.output('arraybuffer'));
};
