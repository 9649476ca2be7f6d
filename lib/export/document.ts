/**
 * Results document rendering (Word, with a plain-text fallback).
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import {
  AlignmentType,
  Document,
  HeadingLevel,
  Packer,
  Paragraph,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType,
} from "docx";
import type { ResultTable } from "../execution/types";
import type { DocumentSections } from "../council/types";

export const DOCUMENT_TITLE = "Statistical Analysis Results";

const SECTION_ORDER: Array<[keyof DocumentSections, string]> = [
  ["methods", "Methods"],
  ["results", "Results"],
  ["legends", "Figure Legends"],
  ["limitations", "Limitations"],
];

// ---------------------------------------------------------------------------
// Markdown-ish text → paragraphs
// ---------------------------------------------------------------------------

/**
 * Split on `**bold**` markers; odd-indexed parts are bold.
 */
export function splitBoldRuns(line: string): Array<{ text: string; bold: boolean }> {
  return line
    .split(/\*\*([^*]+)\*\*/g)
    .map((text, i) => ({ text, bold: i % 2 === 1 }))
    .filter((run) => run.text.length > 0);
}

export function textToParagraphs(text: string): Paragraph[] {
  const paragraphs: Paragraph[] = [];

  for (const line of text.split("\n")) {
    if (line.trim() === "") continue;

    if (line.startsWith("### ")) {
      paragraphs.push(heading(line.slice(4), HeadingLevel.HEADING_3));
    } else if (line.startsWith("## ")) {
      paragraphs.push(heading(line.slice(3), HeadingLevel.HEADING_2));
    } else if (line.startsWith("# ")) {
      paragraphs.push(heading(line.slice(2), HeadingLevel.HEADING_1));
    } else {
      paragraphs.push(
        new Paragraph({
          children: splitBoldRuns(line).map((run) => new TextRun({ text: run.text, bold: run.bold })),
        })
      );
    }
  }

  return paragraphs;
}

function heading(
  text: string,
  level: (typeof HeadingLevel)[keyof typeof HeadingLevel]
): Paragraph {
  return new Paragraph({ heading: level, children: [new TextRun({ text, bold: true })] });
}

function resultTable(result: ResultTable): Table {
  const header = new TableRow({
    tableHeader: true,
    children: result.table.columns.map(
      (c) =>
        new TableCell({
          children: [new Paragraph({ children: [new TextRun({ text: c.name, bold: true })] })],
        })
    ),
  });

  const rows = result.table.rows.map(
    (row) =>
      new TableRow({
        children: result.table.columns.map(
          (_, i) => new TableCell({ children: [new Paragraph(row[i] ?? "")] })
        ),
      })
  );

  return new Table({
    width: { size: 100, type: WidthType.PERCENTAGE },
    rows: [header, ...rows],
  });
}

// ---------------------------------------------------------------------------
// Document
// ---------------------------------------------------------------------------

export function buildResultsDocument(
  sections: DocumentSections,
  tables: ResultTable[] = []
): Document {
  const children: Array<Paragraph | Table> = [
    new Paragraph({
      alignment: AlignmentType.CENTER,
      children: [new TextRun({ text: DOCUMENT_TITLE, bold: true, size: 36 })],
    }),
    new Paragraph({ children: [] }),
  ];

  for (const [key, title] of SECTION_ORDER) {
    children.push(heading(title, HeadingLevel.HEADING_1), ...textToParagraphs(sections[key]));

    if (key === "results") {
      for (const table of tables) {
        if (table.table.columns.length === 0) continue;
        children.push(heading(table.name, HeadingLevel.HEADING_2), resultTable(table));
      }
    }

    children.push(new Paragraph({ children: [] }));
  }

  return new Document({
    styles: {
      default: {
        document: { run: { font: "Arial", size: 24 } },
      },
      paragraphStyles: [
        {
          id: "Heading1",
          name: "Heading 1",
          basedOn: "Normal",
          run: { size: 32, bold: true, font: "Arial" },
          paragraph: { spacing: { before: 240, after: 120 } },
        },
        {
          id: "Heading2",
          name: "Heading 2",
          basedOn: "Normal",
          run: { size: 28, bold: true, font: "Arial" },
          paragraph: { spacing: { before: 200, after: 100 } },
        },
      ],
    },
    sections: [
      {
        properties: {
          page: { margin: { top: 1440, right: 1440, bottom: 1440, left: 1440 } },
        },
        children,
      },
    ],
  });
}

export function buildFallbackText(sections: DocumentSections): string {
  return [
    `METHODS\n\n${sections.methods}`,
    `RESULTS\n\n${sections.results}`,
    `FIGURE LEGENDS\n\n${sections.legends}`,
    `LIMITATIONS\n\n${sections.limitations}`,
  ].join("\n\n");
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export type DocumentFormat = "docx" | "txt";

export interface RenderedDocument {
  path: string;
  format: DocumentFormat;
}

export interface RenderOptions {
  tables?: ResultTable[];
  /** Serializes the document; defaults to docx's Packer */
  pack?: (doc: Document) => Promise<Uint8Array>;
}

/**
 * Write the Word document to `outPath`; if building or writing it fails,
 * write the plain-text version next to it with a `.txt` extension.
 */
export async function renderResultsDocument(
  sections: DocumentSections,
  outPath: string,
  options: RenderOptions = {}
): Promise<RenderedDocument> {
  const pack = options.pack ?? ((doc: Document) => Packer.toBuffer(doc));
  await mkdir(dirname(outPath), { recursive: true });

  try {
    const bytes = await pack(buildResultsDocument(sections, options.tables));
    await writeFile(outPath, bytes);
    return { path: outPath, format: "docx" };
  } catch (error) {
    console.warn("[document] Word document generation failed, writing plain text instead:", error);
    const fallbackPath = outPath.replace(/\.docx$/i, "") + ".txt";
    await writeFile(fallbackPath, buildFallbackText(sections), "utf8");
    return { path: fallbackPath, format: "txt" };
  }
}
