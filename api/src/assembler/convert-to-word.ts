import { AlignmentType, Document, HeadingLevel, Packer, Paragraph, TextRun } from "docx";
import type { DraftState } from "../drafting/session.js";
import type { MotionType } from "../motions/motion-types.js";

export type DraftDocument = "motion" | "order";

/** Splits a line into runs, bolding **text** spans. */
function toRuns(line: string): TextRun[] {
  const runs: TextRun[] = [];
  const boldRegex = /\*\*(.*?)\*\*/g;
  let lastIndex = 0;

  for (const match of line.matchAll(boldRegex)) {
    const index = match.index ?? 0;
    if (index > lastIndex) {
      runs.push(new TextRun(line.substring(lastIndex, index)));
    }
    runs.push(new TextRun({ text: match[1], bold: true }));
    lastIndex = index + match[0].length;
  }
  if (lastIndex < line.length) {
    runs.push(new TextRun(line.substring(lastIndex)));
  }
  return runs.length ? runs : [new TextRun(line)];
}

function toParagraph(line: string): Paragraph {
  if (line.startsWith("# ")) {
    return new Paragraph({
      children: [new TextRun(line.substring(2))],
      heading: HeadingLevel.HEADING_1,
      alignment: AlignmentType.CENTER,
      spacing: { after: 300 },
    });
  }
  if (line.startsWith("## ")) {
    return new Paragraph({
      children: [new TextRun(line.substring(3))],
      heading: HeadingLevel.HEADING_2,
      alignment: AlignmentType.CENTER,
      spacing: { before: 300, after: 200 },
    });
  }
  if (line.startsWith("### ")) {
    return new Paragraph({
      children: [new TextRun(line.substring(4))],
      heading: HeadingLevel.HEADING_3,
      spacing: { before: 200, after: 200 },
    });
  }
  if (line.startsWith("- ") || line.startsWith("* ")) {
    return new Paragraph({
      children: toRuns(`• ${line.substring(2)}`),
      spacing: { after: 100 },
    });
  }
  // Numbered paragraphs keep their own numbers.
  if (/^\d+\.\s/.test(line)) {
    return new Paragraph({ children: toRuns(line), spacing: { after: 100 } });
  }
  return new Paragraph({ children: toRuns(line), spacing: { after: 200 } });
}

/**
 * Converts the markdown-style draft text into a Word document.
 * The text is carried over as written; only layout is added.
 */
export async function convertToWord(content: string, title?: string): Promise<Buffer> {
  const cleanContent = content.trim();
  if (!cleanContent) {
    throw new Error("Document content is empty");
  }

  const lines = cleanContent.split("\n");
  const paragraphs: Paragraph[] = [];

  if (title) {
    paragraphs.push(
      new Paragraph({
        children: [new TextRun(title)],
        heading: HeadingLevel.TITLE,
        alignment: AlignmentType.CENTER,
        spacing: { after: 400 },
      })
    );
  }

  lines.forEach((raw, i) => {
    const line = raw.trim();
    if (!line) {
      // One blank paragraph per run of empty lines.
      if (i > 0 && lines[i - 1]?.trim()) {
        paragraphs.push(new Paragraph({ text: "" }));
      }
      return;
    }
    paragraphs.push(toParagraph(line));
  });

  const doc = new Document({
    sections: [{ properties: {}, children: paragraphs }],
  });

  return Packer.toBuffer(doc);
}

export function draftFilename(document: DraftDocument, motionType: MotionType, revision: number): string {
  const prefix = document === "motion" ? "motion" : "proposed-order";
  return `${prefix}-${motionType}-r${revision}.docx`;
}

/** Renders one document of a draft for download. */
export async function assembleDraftDocument(
  draft: DraftState,
  motionType: MotionType,
  document: DraftDocument
): Promise<{ filename: string; buffer: Buffer }> {
  const text = document === "motion" ? draft.motionText : draft.proposedOrderText;
  return {
    filename: draftFilename(document, motionType, draft.revision),
    buffer: await convertToWord(text),
  };
}
