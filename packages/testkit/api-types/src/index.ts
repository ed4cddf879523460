// Wire shapes served by the in-memory patch-tracking server.
// Only the fields the client reads are modelled; servers send more.

export type NumericId = number;

export interface ProjectItem {
  id: NumericId;
  url: string;
  name: string;
  link_name: string;
  list_id: string;
}

export interface PersonItem {
  id: NumericId;
  url: string;
  name: string | null;
  email: string;
}

export interface UserItem {
  id: NumericId;
  url: string;
  username: string;
  first_name: string;
  last_name: string;
  email: string;
}

export interface SeriesRefItem {
  id: NumericId;
  url: string;
  web_url: string;
  date: string;
  name: string | null;
  version: number;
  mbox: string;
}

export interface PatchRefItem {
  id: NumericId;
  url: string;
  web_url: string;
  msgid: string;
  date: string;
  name: string;
  mbox: string;
}

export interface PatchItem {
  id: NumericId;
  url: string;
  web_url: string;
  project: ProjectItem;
  msgid: string;
  date: string;
  name: string;
  commit_ref: string | null;
  state: string;
  archived: boolean;
  hash: string | null;
  submitter: PersonItem;
  delegate: UserItem | null;
  mbox: string;
  series: SeriesRefItem[];
  diff?: string;
}

export interface SeriesItem {
  id: NumericId;
  url: string;
  web_url: string;
  project: ProjectItem;
  name: string | null;
  date: string;
  submitter: PersonItem;
  version: number;
  total: number;
  received_total: number;
  received_all: boolean;
  mbox: string;
  cover_letter: PatchRefItem | null;
  patches: PatchRefItem[];
}

export interface BundleItem {
  id: NumericId;
  url: string;
  web_url: string;
  project: ProjectItem;
  name: string;
  owner: UserItem;
  patches: PatchRefItem[];
  public: boolean;
  mbox: string;
}

export interface ErrorEnvelope {
  detail: string;
}
