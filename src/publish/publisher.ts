import { PublishError, type PublishStep } from "@/lib/errors";
import type { NotionBlock } from "@/render/notion-blocks";
import type { DocumentStore, RemoteDocument } from "./document-store";

export type PublishState =
  | { status: "searching"; title: string }
  | { status: "found"; document: RemoteDocument; duplicates: number }
  | { status: "not-found"; title: string }
  | { status: "replaced"; document: RemoteDocument; removedBlocks: number }
  | { status: "created"; document: RemoteDocument }
  | { status: "done"; document: RemoteDocument };

export interface PublishRequest {
  store: DocumentStore;
  collectionId: string;
  title: string;
  category: string;
  blocks: NotionBlock[];
  onTransition?: (state: PublishState) => void;
}

export interface PublishResult {
  document: RemoteDocument;
  outcome: "created" | "replaced";
  removedBlocks: number;
}

/**
 * Create-or-replace by exact title. After a successful call exactly one
 * document carries `title` in the collection and its body is `blocks`.
 * There is no lock: overlapping runs for the same title may race.
 */
export async function publishDocument(request: PublishRequest): Promise<PublishResult> {
  const { store, collectionId, title, category, blocks } = request;
  const emit = request.onTransition ?? (() => {});

  const step = async <T>(name: PublishStep, action: () => Promise<T>): Promise<T> => {
    try {
      return await action();
    } catch (error) {
      throw new PublishError(name, title, collectionId, { cause: error });
    }
  };

  emit({ status: "searching", title });
  const matches = await step("search", () => store.findByTitle(collectionId, title));

  if (matches.length === 0) {
    emit({ status: "not-found", title });
    const document = await step("create", () => store.createDocument(collectionId, title, category));
    await step("append", () => store.appendBlocks(document.id, blocks));
    emit({ status: "created", document });
    emit({ status: "done", document });
    return { document, outcome: "created", removedBlocks: 0 };
  }

  const [document, ...duplicates] = matches;
  emit({ status: "found", document, duplicates: duplicates.length });
  for (const duplicate of duplicates) {
    await step("archive", () => store.archiveDocument(duplicate.id));
  }
  await step("category", () => store.assertCategory(document.id, category));
  const existing = await step("list", () => store.listBlockIds(document.id));
  for (const blockId of existing) {
    await step("delete", () => store.deleteBlock(blockId));
  }
  await step("append", () => store.appendBlocks(document.id, blocks));
  emit({ status: "replaced", document, removedBlocks: existing.length });
  emit({ status: "done", document });
  return { document, outcome: "replaced", removedBlocks: existing.length };
}

export function describePublishState(state: PublishState): string {
  switch (state.status) {
    case "searching":
      return `Looking up "${state.title}"...`;
    case "found":
      return state.duplicates > 0
        ? `Found existing page, archiving ${state.duplicates} duplicate(s)...`
        : "Found existing page, replacing content...";
    case "not-found":
      return "No existing page, creating one...";
    case "replaced":
      return `Replaced ${state.removedBlocks} block(s)`;
    case "created":
      return "Page created";
    case "done":
      return "Done";
  }
}
