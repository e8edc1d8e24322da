import { topicIndex } from "@/lib/topics";
import type { FinalizedPayload, FinalizedSection } from "@/lib/types";
import { renderMarkdown } from "./markdown";
import { introBlocks, sectionBlocks, type NotionBlock } from "./notion-blocks";

export interface RenderedBriefing {
  markdown: string;
  blocks: NotionBlock[];
}

function inTopicOrder(sections: FinalizedSection[]): FinalizedSection[] {
  return [...sections].sort((a, b) => topicIndex(a.topic) - topicIndex(b.topic));
}

/** Both presentations come from the same payload and list sections in topic order. */
export function renderBriefing(payload: FinalizedPayload): RenderedBriefing {
  const sections = inTopicOrder(payload.sections);
  return {
    markdown: renderMarkdown(payload.pageTitle, payload.intro, sections),
    blocks: [...introBlocks(payload.intro), ...sections.flatMap(sectionBlocks)]
  };
}
