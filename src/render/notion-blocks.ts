import { NOTION_RICH_TEXT_LIMIT } from "@/lib/constants";
import type { FinalizedSection, NewsItem, TableData } from "@/lib/types";
import { TOP_NEWS_HEADING } from "./markdown";

export interface RichText {
  type: "text";
  text: {
    content: string;
    link?: { url: string };
  };
}

export interface TableRowBlock {
  object: "block";
  type: "table_row";
  table_row: { cells: RichText[][] };
}

export type NotionBlock =
  | { object: "block"; type: "paragraph"; paragraph: { rich_text: RichText[] } }
  | { object: "block"; type: "heading_2"; heading_2: { rich_text: RichText[] } }
  | { object: "block"; type: "heading_3"; heading_3: { rich_text: RichText[] } }
  | {
      object: "block";
      type: "table";
      table: {
        table_width: number;
        has_column_header: boolean;
        has_row_header: boolean;
        children: TableRowBlock[];
      };
    };

/** Notion caps a text span at 2000 characters; longer text becomes consecutive spans. */
export function richText(content: string, link?: string): RichText[] {
  const chunks: string[] = [];
  for (let offset = 0; offset < content.length; offset += NOTION_RICH_TEXT_LIMIT) {
    chunks.push(content.slice(offset, offset + NOTION_RICH_TEXT_LIMIT));
  }
  if (chunks.length === 0) {
    chunks.push("");
  }
  return chunks.map((chunk): RichText => ({
    type: "text",
    text: link ? { content: chunk, link: { url: link } } : { content: chunk }
  }));
}

export function paragraph(rich: RichText[]): NotionBlock {
  return { object: "block", type: "paragraph", paragraph: { rich_text: rich } };
}

export function heading2(text: string): NotionBlock {
  return { object: "block", type: "heading_2", heading_2: { rich_text: richText(text) } };
}

export function heading3(text: string): NotionBlock {
  return { object: "block", type: "heading_3", heading_3: { rich_text: richText(text) } };
}

function tableRow(cells: string[], width: number): TableRowBlock {
  const padded = Array.from({ length: width }, (_, index) => cells[index] ?? "");
  return { object: "block", type: "table_row", table_row: { cells: padded.map((cell) => richText(cell)) } };
}

export function tableBlock(table: TableData): NotionBlock {
  const width = table.header.length;
  return {
    object: "block",
    type: "table",
    table: {
      table_width: width,
      has_column_header: true,
      has_row_header: false,
      children: [tableRow(table.header, width), ...table.rows.map((row) => tableRow(row, width))]
    }
  };
}

function newsParagraph(item: NewsItem): NotionBlock {
  const rich = richText(item.title, item.link);
  const recap = item.recap.trim();
  if (recap) {
    rich.push(...richText(` — ${recap}`));
  }
  return paragraph(rich);
}

export function sectionBlocks(section: FinalizedSection): NotionBlock[] {
  const blocks: NotionBlock[] = [heading2(section.title), tableBlock(section.table)];
  if (section.news.length > 0) {
    blocks.push(heading3(TOP_NEWS_HEADING));
    for (const item of section.news) {
      blocks.push(newsParagraph(item));
    }
  }
  return blocks;
}

export function introBlocks(intro: string): NotionBlock[] {
  return intro ? [paragraph(richText(intro))] : [];
}
