import type { NotionBlock } from "@/render/notion-blocks";

export interface RemoteDocument {
  id: string;
  title: string;
  url: string | null;
}

/**
 * The operations the publisher needs from the destination store. Lookup by
 * title is isolated here so tests can drive the found and not-found branches
 * without a live workspace.
 */
export interface DocumentStore {
  findByTitle(collectionId: string, title: string): Promise<RemoteDocument[]>;
  createDocument(collectionId: string, title: string, category: string): Promise<RemoteDocument>;
  archiveDocument(documentId: string): Promise<void>;
  assertCategory(documentId: string, category: string): Promise<void>;
  listBlockIds(documentId: string): Promise<string[]>;
  deleteBlock(blockId: string): Promise<void>;
  appendBlocks(documentId: string, blocks: NotionBlock[]): Promise<void>;
}
