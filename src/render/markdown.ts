import type { FinalizedSection, TableData } from "@/lib/types";

export const TOP_NEWS_HEADING = "Top news";

function escapeCell(value: string): string {
  return value.replace(/\r?\n/g, " ").replace(/\|/g, "\\|");
}

function tableLine(cells: string[]): string {
  return `| ${cells.map(escapeCell).join(" | ")} |`;
}

function escapeLinkText(value: string): string {
  return value.replace(/\r?\n/g, " ").replace(/[\\[\]]/g, "\\$&");
}

function linkTarget(url: string): string {
  return url.replace(/\(/g, "%28").replace(/\)/g, "%29").replace(/ /g, "%20");
}

export function renderTable(table: TableData): string[] {
  return [
    tableLine(table.header),
    tableLine(table.header.map(() => "---")),
    ...table.rows.map((row) => tableLine(row))
  ];
}

export function renderSectionMarkdown(section: FinalizedSection): string[] {
  const lines: string[] = [`## ${section.title}\n`, ...renderTable(section.table), ""];
  if (section.news.length > 0) {
    lines.push(`### ${TOP_NEWS_HEADING}\n`);
    for (const item of section.news) {
      const recap = item.recap.trim();
      lines.push(`[${escapeLinkText(item.title)}](${linkTarget(item.link)})${recap ? ` — ${recap}` : ""}\n`);
    }
  }
  return lines;
}

export function renderMarkdown(pageTitle: string, intro: string, sections: FinalizedSection[]): string {
  const lines: string[] = [`# ${pageTitle}\n`];
  if (intro) {
    lines.push(`${intro}\n`);
  }
  for (const section of sections) {
    lines.push(...renderSectionMarkdown(section));
  }
  return lines.join("\n");
}
