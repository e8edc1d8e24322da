import { z } from "zod";
import { NOTION_API_URL, NOTION_PAGE_SIZE } from "@/lib/constants";
import { describeError } from "@/lib/errors";
import { type FetchedText, fetchWithTimeout } from "@/lib/http";
import type { BriefingConfig } from "@/lib/types";
import type { NotionBlock } from "@/render/notion-blocks";
import type { DocumentStore, RemoteDocument } from "./document-store";

const pageSchema = z.object({
  id: z.string(),
  url: z.string().nullish()
});

const querySchema = z.object({
  results: z.array(pageSchema),
  has_more: z.boolean().default(false),
  next_cursor: z.string().nullish()
});

const childrenSchema = z.object({
  results: z.array(z.object({ id: z.string() })),
  has_more: z.boolean(),
  next_cursor: z.string().nullable()
});

type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

export interface NotionStoreOptions {
  token: string;
  notion: BriefingConfig["notion"];
  baseUrl?: string;
}

export class NotionDocumentStore implements DocumentStore {
  private readonly baseUrl: string;

  constructor(private readonly options: NotionStoreOptions) {
    this.baseUrl = options.baseUrl ?? NOTION_API_URL;
  }

  async findByTitle(collectionId: string, title: string): Promise<RemoteDocument[]> {
    const filter = { property: this.options.notion.title_property, title: { equals: title } };
    const found: RemoteDocument[] = [];
    let cursor: string | null = null;
    do {
      const body = { filter, page_size: NOTION_PAGE_SIZE, ...(cursor ? { start_cursor: cursor } : {}) };
      const data: z.infer<typeof querySchema> = querySchema.parse(
        await this.request("POST", `databases/${collectionId}/query`, body)
      );
      found.push(...data.results.map((page) => ({ id: page.id, title, url: page.url ?? null })));
      cursor = data.has_more ? (data.next_cursor ?? null) : null;
    } while (cursor);
    return found;
  }

  async createDocument(collectionId: string, title: string, category: string): Promise<RemoteDocument> {
    const body = {
      parent: { database_id: collectionId },
      properties: {
        [this.options.notion.title_property]: { title: [{ type: "text", text: { content: title } }] },
        ...this.categoryProperty(category)
      }
    };
    const page = pageSchema.parse(await this.request("POST", "pages", body));
    return { id: page.id, title, url: page.url ?? null };
  }

  async archiveDocument(documentId: string): Promise<void> {
    await this.request("PATCH", `pages/${documentId}`, { archived: true });
  }

  async assertCategory(documentId: string, category: string): Promise<void> {
    await this.request("PATCH", `pages/${documentId}`, { properties: this.categoryProperty(category) });
  }

  async listBlockIds(documentId: string): Promise<string[]> {
    const ids: string[] = [];
    let cursor: string | null = null;
    do {
      const query = new URLSearchParams({ page_size: String(NOTION_PAGE_SIZE) });
      if (cursor) query.set("start_cursor", cursor);
      const data = childrenSchema.parse(await this.request("GET", `blocks/${documentId}/children?${query.toString()}`));
      ids.push(...data.results.map((block) => block.id));
      cursor = data.has_more ? data.next_cursor : null;
    } while (cursor);
    return ids;
  }

  async deleteBlock(blockId: string): Promise<void> {
    await this.request("DELETE", `blocks/${blockId}`);
  }

  // The API takes at most 100 children per append
  async appendBlocks(documentId: string, blocks: NotionBlock[]): Promise<void> {
    for (let offset = 0; offset < blocks.length; offset += NOTION_PAGE_SIZE) {
      await this.request("PATCH", `blocks/${documentId}/children`, {
        children: blocks.slice(offset, offset + NOTION_PAGE_SIZE)
      });
    }
  }

  private categoryProperty(category: string) {
    return { [this.options.notion.category_property]: { multi_select: [{ name: category }] } };
  }

  private async request(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const url = `${this.baseUrl}/${path}`;
    let response: FetchedText;
    try {
      response = await fetchWithTimeout(
        url,
        {
          method,
          headers: {
            Authorization: `Bearer ${this.options.token}`,
            "Notion-Version": this.options.notion.version,
            "Content-Type": "application/json"
          },
          body: body === undefined ? undefined : JSON.stringify(body)
        },
        this.options.notion.timeout_ms
      );
    } catch (error) {
      throw new Error(`Notion ${method} ${path} failed: ${describeError(error)}`, { cause: error });
    }
    if (!response.ok) {
      throw new Error(`Notion ${method} ${path} failed (${response.status}): ${response.text.slice(0, 300)}`);
    }
    return response.text ? JSON.parse(response.text) : {};
  }
}
