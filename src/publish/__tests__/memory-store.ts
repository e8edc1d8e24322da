import type { NotionBlock } from "@/render/notion-blocks";
import type { DocumentStore, RemoteDocument } from "@/publish/document-store";

interface StoredDocument extends RemoteDocument {
  collectionId: string;
  category: string | null;
  archived: boolean;
  blocks: Array<{ id: string; block: NotionBlock }>;
}

/** In-process stand-in for the Notion database. */
export class MemoryDocumentStore implements DocumentStore {
  readonly documents: StoredDocument[] = [];
  readonly calls: string[] = [];
  failOn: keyof DocumentStore | null = null;
  private nextId = 1;

  seed(collectionId: string, title: string, blocks: NotionBlock[] = []): StoredDocument {
    const document: StoredDocument = {
      id: `page-${this.nextId++}`,
      title,
      url: null,
      collectionId,
      category: null,
      archived: false,
      blocks: []
    };
    document.blocks = blocks.map((block) => ({ id: `block-${this.nextId++}`, block }));
    this.documents.push(document);
    return document;
  }

  live(collectionId: string, title: string): StoredDocument[] {
    return this.documents.filter((doc) => doc.collectionId === collectionId && doc.title === title && !doc.archived);
  }

  async findByTitle(collectionId: string, title: string): Promise<RemoteDocument[]> {
    this.record("findByTitle");
    return this.live(collectionId, title).map(({ id, url }) => ({ id, title, url }));
  }

  async createDocument(collectionId: string, title: string, category: string): Promise<RemoteDocument> {
    this.record("createDocument");
    const document = this.seed(collectionId, title);
    document.category = category;
    document.url = `https://notion.example.com/${document.id}`;
    return { id: document.id, title, url: document.url };
  }

  async archiveDocument(documentId: string): Promise<void> {
    this.record("archiveDocument");
    this.get(documentId).archived = true;
  }

  async assertCategory(documentId: string, category: string): Promise<void> {
    this.record("assertCategory");
    this.get(documentId).category = category;
  }

  async listBlockIds(documentId: string): Promise<string[]> {
    this.record("listBlockIds");
    return this.get(documentId).blocks.map((entry) => entry.id);
  }

  async deleteBlock(blockId: string): Promise<void> {
    this.record("deleteBlock");
    for (const document of this.documents) {
      document.blocks = document.blocks.filter((entry) => entry.id !== blockId);
    }
  }

  async appendBlocks(documentId: string, blocks: NotionBlock[]): Promise<void> {
    this.record("appendBlocks");
    const document = this.get(documentId);
    document.blocks.push(...blocks.map((block) => ({ id: `block-${this.nextId++}`, block })));
  }

  private record(call: keyof DocumentStore) {
    this.calls.push(call);
    if (this.failOn === call) {
      throw new Error(`${call} rejected`);
    }
  }

  private get(documentId: string): StoredDocument {
    const document = this.documents.find((doc) => doc.id === documentId);
    if (!document) throw new Error(`no document ${documentId}`);
    return document;
  }
}
