import { writeTextFile } from "@/lib/load-payload";
import type { BriefingConfig } from "@/lib/types";
import { parseFinalizedPayload } from "@/lib/validate-briefing";
import type { DocumentStore } from "@/publish/document-store";
import { publishDocument, type PublishResult, type PublishState } from "@/publish/publisher";
import { renderBriefing } from "@/render/render-briefing";

export interface DeliveryOptions {
  config: Pick<BriefingConfig, "notion">;
  store: DocumentStore;
  markdownPath: string;
  onTransition?: (state: PublishState) => void;
}

export interface DeliveryResult extends PublishResult {
  markdownPath: string;
  blockCount: number;
}

/**
 * Validates the finalized payload before anything is written, then publishes
 * and overwrites the local mirror. The mirror is written only after the
 * remote page is in its final state.
 */
export async function deliverBriefing(raw: unknown, options: DeliveryOptions): Promise<DeliveryResult> {
  const payload = parseFinalizedPayload(raw);
  const { markdown, blocks } = renderBriefing(payload);
  const result = await publishDocument({
    store: options.store,
    collectionId: options.config.notion.database_id,
    title: payload.pageTitle,
    category: options.config.notion.category,
    blocks,
    onTransition: options.onTransition
  });
  await writeTextFile(options.markdownPath, markdown);
  return { ...result, markdownPath: options.markdownPath, blockCount: blocks.length };
}
