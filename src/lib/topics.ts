export const TOPIC_KEYS = ["fiorentina", "milan", "sinner", "volley_m", "volley_f", "motogp", "f1"] as const;

export type TopicKey = (typeof TOPIC_KEYS)[number];

export const MATCH_COLUMNS = ["Match", "When", "Competition", "Round"] as const;
export const TOURNAMENT_COLUMNS = ["Match", "When", "Tournament", "Round"] as const;
export const SESSION_COLUMNS = ["Session", "Type", "When"] as const;

// Volleyball: only major competitions, friendlies are skipped
const VOLLEY_MAJOR_COMPETITIONS = [
  /VNL|Nations League/i,
  /World Championship|World Cup/i,
  /European Championship|Euro/i
];

export type ProviderQuery =
  | { kind: "team"; teamId: number }
  | { kind: "player"; teamId: number }
  | { kind: "national-team"; teamId: number; competitions: RegExp[] }
  | { kind: "stage-series"; searchQuery: string; category: string };

export interface TopicDefinition {
  key: TopicKey;
  title: string;
  newsKey: string;
  query: ProviderQuery;
  columns: readonly string[];
  candidateLimit?: number;
}

export const TOPICS: readonly TopicDefinition[] = [
  {
    key: "fiorentina",
    title: "Fiorentina",
    newsKey: "fiorentina",
    query: { kind: "team", teamId: 2693 },
    columns: MATCH_COLUMNS
  },
  {
    key: "milan",
    title: "AC Milan",
    newsKey: "milan",
    query: { kind: "team", teamId: 2692 },
    columns: MATCH_COLUMNS
  },
  {
    key: "sinner",
    title: "Jannik Sinner",
    newsKey: "sinner",
    query: { kind: "player", teamId: 206570 },
    columns: TOURNAMENT_COLUMNS
  },
  {
    key: "volley_m",
    title: "Italia Volley (Men)",
    newsKey: "volley_m",
    query: { kind: "national-team", teamId: 6824, competitions: VOLLEY_MAJOR_COMPETITIONS },
    columns: MATCH_COLUMNS
  },
  {
    key: "volley_f",
    title: "Italia Volley (Women)",
    newsKey: "volley_f",
    query: { kind: "national-team", teamId: 6709, competitions: VOLLEY_MAJOR_COMPETITIONS },
    columns: MATCH_COLUMNS
  },
  {
    key: "motogp",
    title: "MotoGP",
    newsKey: "motogp",
    query: { kind: "stage-series", searchQuery: "motogp", category: "motogp" },
    columns: SESSION_COLUMNS
  },
  {
    key: "f1",
    title: "Formula 1",
    newsKey: "f1",
    query: { kind: "stage-series", searchQuery: "formula 1", category: "formula" },
    columns: SESSION_COLUMNS,
    candidateLimit: 16
  }
];

export function topicIndex(key: TopicKey): number {
  return TOPIC_KEYS.indexOf(key);
}

export function emptyTable(topic: TopicDefinition): { header: string[]; rows: string[][] } {
  return { header: [...topic.columns], rows: [] };
}
