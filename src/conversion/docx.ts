import { Document, HeadingLevel, Packer, Paragraph, TextRun } from 'docx';

/**
 * Builds a plain DOCX from page texts. Each page starts on a new page of the
 * document and every non-empty line becomes its own paragraph.
 */
export async function buildDocx(title: string, pages: string[]): Promise<Buffer> {
  const children: Paragraph[] = [new Paragraph({ text: title, heading: HeadingLevel.HEADING_1 })];

  pages.forEach((page, index) => {
    const lines = page.split(/\r?\n/).map((line) => line.trimEnd()).filter((line) => line.trim() !== '');
    lines.forEach((line, lineIndex) => {
      children.push(
        new Paragraph({
          pageBreakBefore: index > 0 && lineIndex === 0,
          children: [new TextRun(line)],
        }),
      );
    });
  });

  const doc = new Document({
    creator: 'batch-media-converter',
    title,
    sections: [{ children }],
  });

  return Packer.toBuffer(doc);
}

export const hasText = (pages: string[]): boolean => pages.some((page) => page.trim() !== '');
