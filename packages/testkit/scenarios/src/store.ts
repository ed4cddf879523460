import type {
  BundleItem,
  PatchItem,
  PersonItem,
  SeriesItem,
  UserItem,
} from "@patchpull/testkit-api-types";

export interface DBSeed {
  patches: PatchItem[];
  series: SeriesItem[];
  bundles: BundleItem[];
  people: PersonItem[];
  users: UserItem[];
  /** Raw content keyed by URL pathname; overrides the generated mbox for that path. */
  content?: Record<string, string>;
}

export interface RecordedRequest {
  method: string;
  pathname: string;
  search: string;
  authorization?: string;
}

export class InMemoryStore {
  patches = new Map<number, PatchItem>();
  series = new Map<number, SeriesItem>();
  bundles = new Map<number, BundleItem>();
  people = new Map<number, PersonItem>();
  users = new Map<number, UserItem>();
  content = new Map<string, string>();
  requests: RecordedRequest[] = [];

  constructor(seed?: Partial<DBSeed>) {
    this.load(seed);
  }

  reset(seed?: Partial<DBSeed>) {
    this.patches.clear();
    this.series.clear();
    this.bundles.clear();
    this.people.clear();
    this.users.clear();
    this.content.clear();
    this.requests = [];
    this.load(seed);
  }

  /** Requests whose path starts with `prefix`, in arrival order. */
  requestsTo(prefix: string): RecordedRequest[] {
    return this.requests.filter((r) => r.pathname.startsWith(prefix));
  }

  private load(seed?: Partial<DBSeed>) {
    if (!seed) return;
    if (seed.patches) seed.patches.forEach((p) => this.patches.set(p.id, p));
    if (seed.series) seed.series.forEach((s) => this.series.set(s.id, s));
    if (seed.bundles) seed.bundles.forEach((b) => this.bundles.set(b.id, b));
    if (seed.people) seed.people.forEach((p) => this.people.set(p.id, p));
    if (seed.users) seed.users.forEach((u) => this.users.set(u.id, u));
    if (seed.content) {
      for (const [path, body] of Object.entries(seed.content)) this.content.set(path, body);
    }
  }
}
