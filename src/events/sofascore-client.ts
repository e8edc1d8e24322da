import { z } from "zod";
import { ParseError } from "@/lib/errors";
import { fetchJson } from "@/lib/http";
import type { BriefingConfig } from "@/lib/types";

const named = z.object({ name: z.string().nullish() });

const eventSchema = z.object({
  id: z.number(),
  startTimestamp: z.number(),
  homeTeam: named.nullish(),
  awayTeam: named.nullish(),
  tournament: z
    .object({
      name: z.string().nullish(),
      category: named.nullish(),
      uniqueTournament: z
        .object({
          name: z.string().nullish(),
          category: named.nullish()
        })
        .nullish()
    })
    .nullish(),
  roundInfo: z
    .object({
      round: z.number().nullish(),
      name: z.string().nullish()
    })
    .nullish(),
  status: z.object({ type: z.string().nullish() }).nullish()
});

const stageSchema = z.object({
  id: z.number(),
  name: z.string().nullish(),
  description: z.string().nullish(),
  startTimestamp: z.number().nullish(),
  startDateTimestamp: z.number().nullish(),
  endDateTimestamp: z.number().nullish(),
  category: named.nullish(),
  type: named.nullish(),
  status: z.object({ type: z.string().nullish() }).nullish()
});

const eventsResponseSchema = z.object({ events: z.array(eventSchema).default([]) });
const stagesResponseSchema = z.object({ stages: z.array(stageSchema).default([]) });
const searchResponseSchema = z.object({
  results: z.array(z.object({ type: z.string(), entity: z.unknown() })).default([])
});

export type ProviderEvent = z.infer<typeof eventSchema>;
export type ProviderStage = z.infer<typeof stageSchema>;

/** Read side of the sports-event provider. Tests substitute an in-memory implementation. */
export interface EventProvider {
  nextTeamEvents(teamId: number): Promise<ProviderEvent[]>;
  lastTeamEvents(teamId: number): Promise<ProviderEvent[]>;
  searchStages(query: string): Promise<ProviderStage[]>;
  stageSessions(stageId: number): Promise<ProviderStage[]>;
}

export function stageStart(stage: ProviderStage): number | null {
  return stage.startDateTimestamp ?? stage.startTimestamp ?? null;
}

export class SofascoreProvider implements EventProvider {
  constructor(private readonly options: BriefingConfig["provider"]) {}

  async nextTeamEvents(teamId: number): Promise<ProviderEvent[]> {
    const data = await this.get(`${this.options.base_url}/team/${teamId}/events/next/0`, eventsResponseSchema);
    return data.events;
  }

  async lastTeamEvents(teamId: number): Promise<ProviderEvent[]> {
    const data = await this.get(`${this.options.base_url}/team/${teamId}/events/last/0`, eventsResponseSchema);
    return data.events;
  }

  /** Search results carry no status, only the stage entity; entries that are not stages are skipped. */
  async searchStages(query: string): Promise<ProviderStage[]> {
    const url = `${this.options.base_url}/search/all?q=${encodeURIComponent(query)}`;
    const data = await this.get(url, searchResponseSchema);
    const stages: ProviderStage[] = [];
    for (const result of data.results) {
      if (result.type !== "stage") continue;
      const parsed = stageSchema.safeParse(result.entity);
      if (parsed.success) {
        stages.push(parsed.data);
      }
    }
    return stages;
  }

  // Motorsport sessions live under the www host
  async stageSessions(stageId: number): Promise<ProviderStage[]> {
    const data = await this.get(`${this.options.sessions_base_url}/stage/${stageId}/substages`, stagesResponseSchema);
    return data.stages;
  }

  private async get<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const raw = await fetchJson(url, { timeoutMs: this.options.timeout_ms });
    const result = schema.safeParse(raw);
    if (!result.success) {
      const first = result.error.issues[0];
      throw new ParseError(url, `unexpected response shape (${first?.path.join(".") || "<root>"}: ${first?.message ?? "invalid"})`);
    }
    return result.data;
  }
}
